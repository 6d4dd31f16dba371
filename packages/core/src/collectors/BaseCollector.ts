import { SourceUnavailableError } from '@hostpulse/shared';
import type { Logger, MetricDomain } from '@hostpulse/shared';
import type { HostShell } from '../exec/HostShell.js';
import { queryManagement, queryPowerShellJson, runPowerShell } from '../exec/powershell.js';
import type { z } from 'zod';

export interface CollectorContext {
  shell: HostShell;
  /** Whether privilege-gated sources may be queried. */
  privileged: boolean;
  /** When false, derived percentages and unit conversions are skipped. */
  precision: boolean;
  now: () => Date;
  logger: Logger;
}

export interface MetricCollector<T> {
  readonly domain: MetricDomain;
  collect(): Promise<T>;
}

/**
 * Shared plumbing for the per-platform collectors. Every helper resolves to
 * null (or an empty list) instead of throwing, and logs the miss at debug.
 */
export abstract class BaseCollector<T> implements MetricCollector<T> {
  abstract readonly domain: MetricDomain;

  protected readonly shell: HostShell;
  protected readonly context: CollectorContext;
  protected readonly logger: Logger;

  constructor(context: CollectorContext) {
    this.context = context;
    this.shell = context.shell;
    this.logger = context.logger;
  }

  abstract collect(): Promise<T>;

  /** Stdout of a command, or null when it could not run or printed nothing. */
  protected async output(command: string, args: string[] = []): Promise<string | null> {
    const result = await this.shell.exec(command, args);
    if (!result) {
      this.unavailable(command, 'command failed to run');
      return null;
    }
    if (result.stdout.trim().length === 0) {
      this.unavailable(command, `no output (exit ${result.exitCode ?? 'unknown'})`);
      return null;
    }
    return result.stdout;
  }

  /** Like {@link output}, but only when the command is on PATH. */
  protected async optionalOutput(command: string, args: string[] = []): Promise<string | null> {
    if (!(await this.shell.hasCommand(command))) {
      this.unavailable(command, 'not installed');
      return null;
    }
    return this.output(command, args);
  }

  protected async powershell(script: string): Promise<string | null> {
    const output = await runPowerShell(this.shell, script);
    if (output === null) this.unavailable('powershell', script);
    return output;
  }

  protected async management(className: string, pipeline: string): Promise<string | null> {
    const value = await queryManagement(this.shell, className, pipeline);
    if (value === null) this.unavailable(className, pipeline);
    return value;
  }

  protected async powershellJson<R>(
    script: string,
    itemSchema: z.ZodType<R, z.ZodTypeDef, unknown>,
  ): Promise<R[]> {
    const items = await queryPowerShellJson(this.shell, script, itemSchema);
    if (items.length === 0) this.unavailable('powershell', script);
    return items;
  }

  protected unavailable(source: string, reason?: string): void {
    this.logger.debug(
      { domain: this.domain, err: new SourceUnavailableError(source, reason) },
      'source unavailable',
    );
  }
}
