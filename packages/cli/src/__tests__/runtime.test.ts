import { describe, it, expect, vi, beforeEach } from 'vitest';
import { makeConfig } from './helpers/snapshot.js';

const mocks = vi.hoisted(() => ({
  loadMonitorConfig: vi.fn(),
  createLogger: vi.fn(),
  setDefaultLogger: vi.fn(),
}));

vi.mock('@hostpulse/core', () => ({
  loadMonitorConfig: (...args: unknown[]) => mocks.loadMonitorConfig(...args),
}));

vi.mock('@hostpulse/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@hostpulse/shared')>()),
  createLogger: (...args: unknown[]) => mocks.createLogger(...args),
  setDefaultLogger: (...args: unknown[]) => mocks.setDefaultLogger(...args),
}));

import { errorMessage, initRuntime, parseAlertThresholds } from '../utils/runtime.js';

describe('parseAlertThresholds', () => {
  it('should read cpu, memory and disk in order', () => {
    expect(parseAlertThresholds('70,75,95')).toEqual({ cpu: 70, memory: 75, disk: 95 });
  });

  it('should skip empty positions', () => {
    expect(parseAlertThresholds(',,95')).toEqual({ disk: 95 });
    expect(parseAlertThresholds('60')).toEqual({ cpu: 60 });
  });

  it('should trim spaces around values', () => {
    expect(parseAlertThresholds(' 70 , 75 ')).toEqual({ cpu: 70, memory: 75 });
  });
});

describe('initRuntime', () => {
  const config = makeConfig();
  const logger = { info: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.loadMonitorConfig.mockReturnValue(config);
    mocks.createLogger.mockReturnValue(logger);
  });

  it('should pass overrides to the config loader', () => {
    initRuntime({ continuous: true, interval: '10s' });

    expect(mocks.loadMonitorConfig).toHaveBeenCalledWith({
      overrides: { continuous: true, interval: '10s' },
    });
  });

  it('should log at the configured level to the monitor log file', () => {
    initRuntime();

    expect(mocks.createLogger).toHaveBeenCalledWith({
      level: 'silent',
      destination: '/srv/hostpulse/logs/monitor.log',
      pretty: process.stderr.isTTY === true,
    });
  });

  it('should install the logger as the default and return it', () => {
    const runtime = initRuntime();

    expect(mocks.setDefaultLogger).toHaveBeenCalledWith(logger);
    expect(runtime.config).toBe(config);
    expect(runtime.logger).toBe(logger);
  });

  it('should propagate config errors', () => {
    mocks.loadMonitorConfig.mockImplementation(() => {
      throw new Error('Configuration validation failed');
    });

    expect(() => initRuntime()).toThrow('Configuration validation failed');
    expect(mocks.createLogger).not.toHaveBeenCalled();
  });
});

describe('errorMessage', () => {
  it('should use the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
  });
});
