import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Log file written in addition to stderr. */
  destination?: string;
}

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: 'SYS:HH:MM:ss.l',
  ignore: 'pid,hostname',
  destination: 2,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Logs go to stderr so that stdout stays free for JSON output.
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { name = 'hostpulse', level = 'info', pretty = false, destination } = options;

  if (destination) {
    // Multi-target transports reject custom level formatters.
    return pino({
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: {
        targets: [
          { target: 'pino/file', level, options: { destination, mkdir: true } },
          pretty
            ? { target: 'pino-pretty', level, options: PRETTY_OPTIONS }
            : { target: 'pino/file', level, options: { destination: 2 } },
        ],
      },
    });
  }

  const baseOptions: pino.LoggerOptions = {
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (pretty) {
    return pino({ ...baseOptions, transport: { target: 'pino-pretty', options: PRETTY_OPTIONS } });
  }

  return pino(baseOptions, pino.destination(2));
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    const envLevel = process.env.HOSTPULSE_LOG_LEVEL;
    const level = isLogLevel(envLevel) ? envLevel : 'info';
    defaultLogger = createLogger({
      level,
      pretty: process.env.NODE_ENV !== 'production' && level !== 'silent',
    });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}
