import { formatDuration, getLogger } from '@hostpulse/shared';
import type { Alert, Logger, MonitorConfig, Snapshot } from '@hostpulse/shared';
import { evaluateAlerts } from '../alerts/evaluateAlerts.js';
import type { SnapshotAssembler } from '../snapshot/SnapshotAssembler.js';

export interface CycleResult {
  cycle: number;
  snapshot: Snapshot;
  alerts: Alert[];
}

export interface MonitorOptions {
  assembler: Pick<SnapshotAssembler, 'collect'>;
  config: MonitorConfig;
  logger?: Logger;
  /** Called after every persisted cycle, e.g. to regenerate the HTML report. */
  onCycle?: (result: CycleResult) => void | Promise<void>;
  /** Stop the continuous loop on SIGINT/SIGTERM. Defaults to true. */
  handleSignals?: boolean;
}

/** Sleep that resolves early when `signal` aborts. */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class Monitor {
  private readonly assembler: Pick<SnapshotAssembler, 'collect'>;
  private readonly config: MonitorConfig;
  private readonly logger: Logger;
  private readonly onCycle: MonitorOptions['onCycle'];
  private readonly handleSignals: boolean;
  private running = false;
  private abortController: AbortController | null = null;
  private cycles = 0;

  constructor(options: MonitorOptions) {
    this.assembler = options.assembler;
    this.config = options.config;
    this.logger = options.logger ?? getLogger();
    this.onCycle = options.onCycle;
    this.handleSignals = options.handleSignals ?? true;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Collect, persist and check alerts once. Orchestration errors propagate. */
  async runOnce(): Promise<CycleResult> {
    const snapshot = await this.assembler.collect();
    const alerts = evaluateAlerts(snapshot, this.config.thresholds);

    for (const alert of alerts) {
      this.logger.warn({ metric: alert.metric, value: alert.value }, alert.message);
    }

    this.cycles++;
    const result: CycleResult = { cycle: this.cycles, snapshot, alerts };
    await this.onCycle?.(result);
    return result;
  }

  /**
   * Collect until stopped, sleeping the configured interval after each
   * cycle. Stopping never interrupts a cycle that is already running.
   */
  async runContinuous(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();
    const { signal } = this.abortController;

    const shutdown = () => {
      this.logger.info('Monitoring stopped by user');
      this.stop();
    };
    if (this.handleSignals) {
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    }

    this.logger.info(
      { interval: formatDuration(this.config.interval) },
      'Running in continuous mode',
    );

    try {
      while (this.running) {
        try {
          await this.runOnce();
        } catch (err) {
          this.logger.error({ err }, 'Collection cycle failed');
        }
        if (!this.running) break;
        await delay(this.config.interval, signal);
      }
    } finally {
      this.running = false;
      if (this.handleSignals) {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
      }
    }
  }

  stop(): void {
    this.running = false;
    this.abortController?.abort();
  }
}
