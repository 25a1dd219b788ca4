import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Destination for formatted log lines. Info and success go to `out`,
 * everything else to `err`.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.info(line),
  err: (line) => console.error(line),
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix: string;
  sink: LogSink;
}

/**
 * Level logger with colored output
 */
export class Logger {
  private level: LogLevel = "info";
  private prefix = "";
  private sink: LogSink = consoleSink;
  private readonly children: Logger[] = [];

  /**
   * Configure the logger. Level and sink changes propagate to child loggers.
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
    if (config.sink !== undefined) {
      this.sink = config.sink;
    }
    const inherited: Partial<LoggerConfig> = {};
    if (config.level !== undefined) inherited.level = config.level;
    if (config.sink !== undefined) inherited.sink = config.sink;
    for (const child of this.children) {
      child.configure(inherited);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string): void {
    if (this.shouldLog("debug")) {
      this.sink.err(chalk.gray(this.format(message)));
    }
  }

  info(message: string): void {
    if (this.shouldLog("info")) {
      this.sink.out(this.format(message));
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string): void {
    if (this.shouldLog("warn")) {
      this.sink.err(chalk.yellow(this.format(message)));
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string): void {
    if (this.shouldLog("error")) {
      this.sink.err(chalk.red(this.format(message)));
    }
  }

  /**
   * Success message (green), shown at info level
   */
  success(message: string): void {
    if (this.shouldLog("info")) {
      this.sink.out(chalk.green(this.format(message)));
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.sink = this.sink;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    this.children.push(child);
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
