import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// --- Mock node:fs/promises ---
const mockMkdir = vi.fn();
const mockWriteFile = vi.fn();
const mockRename = vi.fn();
const mockUnlink = vi.fn();
const mockReadFile = vi.fn();
vi.mock('node:fs/promises', () => ({
  mkdir: (...args: unknown[]) => mockMkdir(...args),
  writeFile: (...args: unknown[]) => mockWriteFile(...args),
  rename: (...args: unknown[]) => mockRename(...args),
  unlink: (...args: unknown[]) => mockUnlink(...args),
  readFile: (...args: unknown[]) => mockReadFile(...args),
}));

import {
  InvalidSnapshotError,
  SnapshotNotFoundError,
  SnapshotWriteError,
  createLogger,
} from '@hostpulse/shared';
import { SnapshotStore } from '../snapshot/SnapshotStore.js';
import { sampleSnapshot } from './helpers/snapshots.js';

const PATH = '/srv/hostpulse/reports/metrics.json';

function createStore(): SnapshotStore {
  return new SnapshotStore(PATH, createLogger({ level: 'silent' }));
}

describe('SnapshotStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(Date, 'now').mockReturnValue(1000);
    mockMkdir.mockResolvedValue(undefined);
    mockWriteFile.mockResolvedValue(undefined);
    mockRename.mockResolvedValue(undefined);
    mockUnlink.mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('write', () => {
    it('should write to a temp file and rename it into place', async () => {
      const snapshot = sampleSnapshot();

      await createStore().write(snapshot);

      expect(mockMkdir).toHaveBeenCalledWith('/srv/hostpulse/reports', { recursive: true });
      expect(mockWriteFile).toHaveBeenCalledWith(
        `${PATH}.tmp.1000`,
        JSON.stringify(snapshot, null, 2),
        'utf-8',
      );
      expect(mockRename).toHaveBeenCalledWith(`${PATH}.tmp.1000`, PATH);
      expect(mockUnlink).not.toHaveBeenCalled();
    });

    it('should remove the temp file and raise a write error on failure', async () => {
      mockWriteFile.mockRejectedValue(new Error('EACCES: permission denied'));

      const error = await createStore()
        .write(sampleSnapshot())
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SnapshotWriteError);
      expect(error).toHaveProperty(
        'message',
        `Failed to write snapshot to ${PATH}: EACCES: permission denied`,
      );
      expect(mockUnlink).toHaveBeenCalledWith(`${PATH}.tmp.1000`);
      expect(mockRename).not.toHaveBeenCalled();
    });

    it('should still raise the write error when the temp file cannot be removed', async () => {
      mockRename.mockRejectedValue(new Error('EXDEV: cross-device link'));
      mockUnlink.mockRejectedValue(new Error('ENOENT'));

      await expect(createStore().write(sampleSnapshot())).rejects.toThrow(
        `Failed to write snapshot to ${PATH}: EXDEV: cross-device link`,
      );
    });
  });

  describe('read', () => {
    it('should return a valid snapshot', async () => {
      const snapshot = sampleSnapshot();
      mockReadFile.mockResolvedValue(JSON.stringify(snapshot));

      expect(await createStore().read()).toEqual(snapshot);
    });

    it('should raise not found for a missing file', async () => {
      mockReadFile.mockRejectedValue(Object.assign(new Error('no such file'), { code: 'ENOENT' }));

      await expect(createStore().read()).rejects.toBeInstanceOf(SnapshotNotFoundError);
    });

    it('should rethrow other read errors', async () => {
      mockReadFile.mockRejectedValue(Object.assign(new Error('permission denied'), { code: 'EACCES' }));

      await expect(createStore().read()).rejects.toThrow('permission denied');
    });

    it('should reject unparseable JSON', async () => {
      mockReadFile.mockResolvedValue('{"timestamp":');

      await expect(createStore().read()).rejects.toBeInstanceOf(InvalidSnapshotError);
    });

    it('should list schema violations by path', async () => {
      const { cpu: _cpu, ...withoutCpu } = sampleSnapshot();
      mockReadFile.mockResolvedValue(JSON.stringify(withoutCpu));

      const error = await createStore()
        .read()
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidSnapshotError);
      expect(error).toHaveProperty('errors', ['cpu: Required']);
    });
  });
});
