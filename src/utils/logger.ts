/**
 * Logger Module
 *
 * Leveled, component-tagged logging. Entries go either to stderr or to a
 * size-rotated file; stdout is reserved for command output.
 *
 * Entry format: `[ISO timestamp] [LEVEL] [component] message {meta}`
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  /** Resolves once queued file writes have completed */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  /** Directory for log files; entries go to stderr when omitted */
  logDir?: string;
  /** Size in bytes at which the log file is rotated (default: 10MB) */
  maxFileSize?: number;
  /** Number of files kept, the active one included (default: 3) */
  maxFiles?: number;
  /** Initial level (default: INFO) */
  level?: LogLevel;
  /** Log file name (default: syntree-comments.log) */
  fileName?: string;
}

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_FILES = 3;
const DEFAULT_LOG_FILE_NAME = 'syntree-comments.log';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

// ============================================================================
// Sinks
// ============================================================================

interface LogSink {
  write(level: LogLevel, entry: string): void;
  flush(): Promise<void>;
}

class StderrSink implements LogSink {
  write(level: LogLevel, entry: string): void {
    if (level === LogLevel.ERROR) {
      console.error(entry);
    } else if (level === LogLevel.WARN) {
      console.warn(entry);
    } else {
      process.stderr.write(entry + '\n');
    }
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Appends entries to `<dir>/<fileName>`. Before each append the file is
 * rotated if it has reached `maxFileSize`: `name.log` becomes `name.1.log`,
 * `name.1.log` becomes `name.2.log`, and so on up to `maxFiles - 1`.
 */
class RotatingFileSink implements LogSink {
  private pending: Promise<void> = Promise.resolve();
  private readonly fallback = new StderrSink();

  constructor(
    private readonly dir: string,
    private readonly fileName: string,
    private readonly maxFileSize: number,
    private readonly maxFiles: number
  ) {}

  private get activePath(): string {
    return path.join(this.dir, this.fileName);
  }

  private rotatedPath(index: number): string {
    return path.join(this.dir, `${path.basename(this.fileName, '.log')}.${index}.log`);
  }

  private async rotate(): Promise<void> {
    let size: number;
    try {
      size = (await fs.promises.stat(this.activePath)).size;
    } catch {
      return; // nothing written yet
    }
    if (size < this.maxFileSize) {
      return;
    }

    await fs.promises.rm(this.rotatedPath(this.maxFiles - 1), { force: true });
    for (let i = this.maxFiles - 2; i >= 0; i--) {
      const from = i === 0 ? this.activePath : this.rotatedPath(i);
      if (fs.existsSync(from)) {
        await fs.promises.rename(from, this.rotatedPath(i + 1));
      }
    }
  }

  write(level: LogLevel, entry: string): void {
    // Chained so entries land in call order
    this.pending = this.pending.then(async () => {
      try {
        await this.rotate();
        await fs.promises.appendFile(this.activePath, entry + '\n');
      } catch (err) {
        console.error('[Logger] Failed to write to log file:', err);
        this.fallback.write(level, entry);
      }
    });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

// ============================================================================
// Logger
// ============================================================================

class LeveledLogger implements Logger {
  constructor(
    private level: LogLevel,
    private readonly sink: LogSink
  ) {}

  private log(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) return;

    let entry = `[${new Date().toISOString()}] [${LEVEL_NAMES[level]}] [${component}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      entry += ` ${JSON.stringify(meta)}`;
    }
    this.sink.write(level, entry);
  }

  error(component: string, message: string, meta?: object): void {
    this.log(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.log(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.log(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.log(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  flush(): Promise<void> {
    return this.sink.flush();
  }
}

function createSink(config: LoggerConfig): LogSink {
  if (!config.logDir) {
    return new StderrSink();
  }

  try {
    fs.mkdirSync(config.logDir, { recursive: true });
  } catch (err) {
    console.error(`[Logger] Failed to create log directory: ${config.logDir}`, err);
    return new StderrSink();
  }

  return new RotatingFileSink(
    config.logDir,
    config.fileName ?? DEFAULT_LOG_FILE_NAME,
    config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
    config.maxFiles ?? DEFAULT_MAX_FILES
  );
}

// ============================================================================
// Singleton
// ============================================================================

let loggerInstance: Logger | null = null;

/**
 * Level requested by the environment: DEBUG / SYNTREE_COMMENTS_DEBUG
 * (`1`, `true` or `debug`) win over LOG_LEVEL / SYNTREE_COMMENTS_LOG_LEVEL.
 */
function getLogLevelFromEnv(): LogLevel {
  const debug = process.env.DEBUG || process.env.SYNTREE_COMMENTS_DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = process.env.LOG_LEVEL || process.env.SYNTREE_COMMENTS_LOG_LEVEL;
  return logLevel ? parseLogLevel(logLevel) : LogLevel.INFO;
}

/**
 * Create a file-backed logger and make it the active instance
 *
 * @param logDir - Directory for log files (created if missing)
 */
export function createLogger(logDir: string, config: Omit<LoggerConfig, 'logDir'> = {}): Logger {
  const full: LoggerConfig = { ...config, logDir };
  loggerInstance = new LeveledLogger(config.level ?? getLogLevelFromEnv(), createSink(full));
  return loggerInstance;
}

/**
 * The active logger; a stderr logger is created on first use
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    const level = getLogLevelFromEnv();
    loggerInstance = new LeveledLogger(level, new StderrSink());

    if (level === LogLevel.DEBUG) {
      loggerInstance.debug('logger', 'Debug logging enabled via environment variable');
    }
  }
  return loggerInstance;
}

/**
 * Drop the active logger (tests)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Parse a level name, case-insensitively; unknown names mean INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
