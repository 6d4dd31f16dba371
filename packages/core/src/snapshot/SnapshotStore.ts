import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  InvalidSnapshotError,
  SnapshotNotFoundError,
  SnapshotWriteError,
  getLogger,
  snapshotSchema,
} from '@hostpulse/shared';
import type { Logger, Snapshot } from '@hostpulse/shared';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The single persisted snapshot. Each write replaces the previous one
 * atomically (temp file, then rename).
 */
export class SnapshotStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(path: string, logger: Logger = getLogger()) {
    this.path = path;
    this.logger = logger;
  }

  async write(snapshot: Snapshot): Promise<void> {
    const content = JSON.stringify(snapshot, null, 2);
    const tmpPath = `${this.path}.tmp.${Date.now()}`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, this.path);
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        this.logger.debug({ err: cleanupError, path: tmpPath }, 'temp snapshot not removed');
      });
      throw new SnapshotWriteError(this.path, reasonOf(error));
    }
  }

  async read(): Promise<Snapshot> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) throw new SnapshotNotFoundError(this.path);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new InvalidSnapshotError(this.path, [reasonOf(error)]);
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidSnapshotError(
        this.path,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return result.data;
  }
}
