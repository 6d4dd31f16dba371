import { spawn } from 'node:child_process';
import { access, readFile, readdir, constants } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { DEFAULT_COMMAND_TIMEOUT } from '@hostpulse/shared';

export interface CommandResult {
  stdout: string;
  exitCode: number | null;
}

export interface ExecOptions {
  timeout?: number;
}

/**
 * Everything a collector may ask of the host. Collectors never touch
 * child_process or fs directly, so tests can script the host.
 */
export interface HostShell {
  /** Resolves null when the command cannot be started or was killed. */
  exec(command: string, args?: string[], options?: ExecOptions): Promise<CommandResult | null>;
  hasCommand(name: string): Promise<boolean>;
  readFile(path: string): Promise<string | null>;
  listDir(path: string): Promise<string[] | null>;
  pathExists(path: string): Promise<boolean>;
}

export interface NodeHostShellOptions {
  timeout?: number;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export class NodeHostShell implements HostShell {
  private readonly timeout: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private commandCache: Map<string, boolean> = new Map();

  constructor(options: NodeHostShellOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_COMMAND_TIMEOUT;
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  exec(command: string, args: string[] = [], options: ExecOptions = {}): Promise<CommandResult | null> {
    return new Promise((resolve) => {
      let stdout = '';

      const child = spawn(command, args, {
        timeout: options.timeout ?? this.timeout,
        stdio: ['ignore', 'pipe', 'ignore'],
        env: this.env,
        windowsHide: true,
      });

      // Decode across chunk boundaries so multibyte characters such as ° survive.
      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === null && signal !== null) {
          resolve(null);
          return;
        }
        resolve({ stdout, exitCode: code });
      });

      child.on('error', (_err: Error) => {
        resolve(null);
      });
    });
  }

  async hasCommand(name: string): Promise<boolean> {
    const cached = this.commandCache.get(name);
    if (cached !== undefined) return cached;

    const dirs = (this.env.PATH ?? this.env.Path ?? '').split(delimiter).filter(Boolean);
    const extensions =
      this.platform === 'win32'
        ? ['', ...(this.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
        : [''];

    let found = false;
    for (const dir of dirs) {
      for (const ext of extensions) {
        if (await this.pathExists(join(dir, name + ext), constants.X_OK)) {
          found = true;
          break;
        }
      }
      if (found) break;
    }

    this.commandCache.set(name, found);
    return found;
  }

  async readFile(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch {
      return null;
    }
  }

  async listDir(path: string): Promise<string[] | null> {
    try {
      return await readdir(path);
    } catch {
      return null;
    }
  }

  async pathExists(path: string, mode: number = constants.F_OK): Promise<boolean> {
    try {
      await access(path, mode);
      return true;
    } catch {
      return false;
    }
  }
}
