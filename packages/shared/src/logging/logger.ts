/**
 * Structured logger. Entries go to stderr so stdout stays free for command output.
 * @module @faultline/shared/logging/logger
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Fault instance ID */
  instanceId?: string;
  service?: string;
  component?: string;
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  service?: string;
  component?: string;
  /** Human-readable lines instead of JSON */
  pretty?: boolean;
  /** Sink replacing stderr */
  output?: (entry: LogEntry) => void;
}

/**
 * Process-wide minimum level, taking precedence over each logger's own
 */
let thresholdOverride: LogLevel | undefined;

/**
 * Set (or clear) the process-wide minimum level, e.g. from a --log-level flag
 */
export function setLogThreshold(level: LogLevel | undefined): void {
  thresholdOverride = level;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

/**
 * Structured logger
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { level: 'info', ...config };
    this.meta = {
      ...meta,
      service: config.service ?? meta.service,
      component: config.component ?? meta.component,
    };
  }

  /**
   * Child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Child logger scoped to a fault instance
   */
  forInstance(instanceId: string): Logger {
    return this.child({ instanceId });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    const minimum = thresholdOverride ?? this.config.level;
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[minimum]) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };

    const merged = Object.fromEntries(
      Object.entries({ ...this.meta, ...meta }).filter(([, value]) => value !== undefined),
    );
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }

    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
      const code: unknown = 'code' in error ? error.code : undefined;
      if (typeof code === 'string' || typeof code === 'number') {
        entry.error.code = code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      const line = this.config.pretty ? formatPretty(entry) : JSON.stringify(entry);
      process.stderr.write(`${line}\n`);
    }
  }
}

/**
 * One-line rendering for terminals: `time LEVEL message (component) <instance>`
 */
export function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  let output = `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${entry.message}`;

  if (entry.meta?.component) {
    output += ` ${color}(${entry.meta.component})${RESET}`;
  }
  if (entry.meta?.instanceId) {
    output += ` ${color}<${entry.meta.instanceId}>${RESET}`;
  }
  if (entry.error) {
    output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
  }

  return output;
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

/**
 * Check if a value names a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

/**
 * Create a logger as configured, without environment detection
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a component logger.
 * Silent under test unless LOG_LEVEL is set; pretty when stderr is a terminal.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const envLevel = process.env.LOG_LEVEL;
  if (isTestEnvironment() && !envLevel) {
    return new Logger({ ...config, output: () => undefined }, meta);
  }
  return new Logger({
    pretty: process.stderr.isTTY === true,
    ...config,
    ...(isLogLevel(envLevel) ? { level: envLevel } : {}),
  }, meta);
}
