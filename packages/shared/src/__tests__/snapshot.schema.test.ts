import { describe, it, expect } from 'vitest';
import { snapshotSchema, loadMetricsSchema, diskEntrySchema } from '../schemas/snapshot.schema.js';
import { emptyDomainResults, emptyNetworkEntry } from '../defaults.js';

function buildSnapshot(): Record<string, unknown> {
  return {
    timestamp: '2026-10-19T10:00:00+02:00',
    hostname: 'build-01',
    ...emptyDomainResults(),
    disk: [
      {
        filesystem: '/dev/sda1',
        size: '50G',
        used: '36G',
        available: '14G',
        use_percent: 72,
        mount_point: '/',
        smart_status: 'N/A',
      },
    ],
    network: [emptyNetworkEntry('eth0')],
  };
}

describe('snapshotSchema', () => {
  it('should accept a fully defaulted snapshot', () => {
    const result = snapshotSchema.safeParse({
      timestamp: '2026-10-19T10:00:00Z',
      hostname: 'unknown',
      ...emptyDomainResults(),
    });
    expect(result.success).toBe(true);
  });

  it('should accept a populated snapshot', () => {
    expect(snapshotSchema.safeParse(buildSnapshot()).success).toBe(true);
  });

  it('should reject a snapshot with a missing domain', () => {
    const snapshot = buildSnapshot();
    delete snapshot.gpu;
    const result = snapshotSchema.safeParse(snapshot);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['gpu']);
    }
  });

  it('should reject a negative counter', () => {
    const snapshot = buildSnapshot();
    snapshot.network = [{ ...emptyNetworkEntry('eth0'), rx_bytes: -1 }];
    expect(snapshotSchema.safeParse(snapshot).success).toBe(false);
  });
});

describe('diskEntrySchema', () => {
  it('should reject a use percent above 100', () => {
    const result = diskEntrySchema.safeParse({
      filesystem: '/dev/sda1',
      size: '50G',
      used: '36G',
      available: '14G',
      use_percent: 150,
      mount_point: '/',
      smart_status: 'N/A',
    });
    expect(result.success).toBe(false);
  });
});

describe('loadMetricsSchema', () => {
  it('should require decimal strings for load figures', () => {
    const result = loadMetricsSchema.safeParse({
      load_1min: 'high',
      load_5min: '0.00',
      load_15min: '0.00',
      uptime: '0d 0h 0m 0s',
      uptime_seconds: 0,
    });
    expect(result.success).toBe(false);
  });
});
