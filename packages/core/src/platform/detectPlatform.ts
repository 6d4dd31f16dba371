import { type } from 'node:os';
import type { Platform } from '@hostpulse/shared';
import type { HostShell } from '../exec/HostShell.js';
import { findPowerShell } from '../exec/powershell.js';

export interface DetectPlatformOptions {
  /** Native OS identifier, as `uname -s` or `os.type()` report it. */
  osType?: string;
  env?: NodeJS.ProcessEnv;
}

export function platformFromOsType(osType: string): Platform | null {
  if (osType.startsWith('Darwin')) return 'macos';
  if (osType.startsWith('Linux')) return 'linux';
  if (/^(MINGW|MSYS|CYGWIN|Windows)/.test(osType)) return 'windows';
  return null;
}

function hasWindowsEnvironment(env: NodeJS.ProcessEnv): boolean {
  return Boolean(env.OS?.toLowerCase().includes('windows') || env.WINDIR || env.SYSTEMROOT);
}

/**
 * Classify the host once per run. Never throws: hosts that match nothing
 * are reported as `unknown`.
 */
export async function detectPlatform(
  shell: HostShell,
  options: DetectPlatformOptions = {},
): Promise<Platform> {
  const { osType = type(), env = process.env } = options;

  const native = platformFromOsType(osType);
  if (native) return native;

  const powershell = await findPowerShell(shell);
  if (!powershell) return 'unknown';

  if (hasWindowsEnvironment(env)) return 'windows';

  const osClass = await shell.exec(powershell, [
    '-NoProfile',
    '-NonInteractive',
    '-Command',
    'Get-WmiObject -Class Win32_OperatingSystem -ErrorAction SilentlyContinue',
  ]);
  return osClass?.exitCode === 0 ? 'windows' : 'unknown';
}
