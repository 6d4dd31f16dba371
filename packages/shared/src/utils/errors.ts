export class HostPulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'HostPulseError';
    this.code = code;
  }
}

/**
 * A data source could not be queried or returned unusable output.
 * Collectors catch this internally and substitute defaults.
 */
export class SourceUnavailableError extends HostPulseError {
  public readonly source: string;

  constructor(source: string, reason?: string) {
    super(
      reason ? `Source unavailable: ${source} (${reason})` : `Source unavailable: ${source}`,
      'SOURCE_UNAVAILABLE',
    );
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

export class ConfigValidationError extends HostPulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class SnapshotNotFoundError extends HostPulseError {
  constructor(path: string) {
    super(`No snapshot found at ${path}. Run: hostpulse collect`, 'SNAPSHOT_NOT_FOUND');
    this.name = 'SnapshotNotFoundError';
  }
}

export class InvalidSnapshotError extends HostPulseError {
  public readonly errors: string[];

  constructor(path: string, errors: string[]) {
    super(`Snapshot at ${path} is invalid:\n${errors.join('\n')}`, 'INVALID_SNAPSHOT');
    this.name = 'InvalidSnapshotError';
    this.errors = errors;
  }
}

export class SnapshotWriteError extends HostPulseError {
  constructor(path: string, reason: string) {
    super(`Failed to write snapshot to ${path}: ${reason}`, 'SNAPSHOT_WRITE_FAILED');
    this.name = 'SnapshotWriteError';
  }
}
