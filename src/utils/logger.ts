/**
 * @arch shiftmap.infra.logging
 *
 * Level-filtered console logging for the builder and analyzer.
 * Component loggers are children of the shared `logger`, so one
 * `setLevel` call on the root quiets them all.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  tag: string;
  color: ChalkInstance;
  sink: (line: string) => void;
}

const LEVEL_STYLES: Record<EmittingLevel, LevelStyle> = {
  debug: { tag: 'DEBUG', color: chalk.gray, sink: (line) => console.log(line) },
  info: { tag: 'INFO', color: chalk.blue, sink: (line) => console.log(line) },
  warn: { tag: 'WARN', color: chalk.yellow, sink: (line) => console.warn(line) },
  error: { tag: 'ERROR', color: chalk.red, sink: (line) => console.error(line) },
};

/** Extra detail printed on the line after the message. */
export type LogData = Record<string, unknown> | Error;

function formatData(data: LogData): string {
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  return JSON.stringify(data, null, 2);
}

class Logger {
  private level: LogLevel = 'info';

  constructor(
    private readonly prefix: string = '',
    private parent: Logger | null = null
  ) {}

  /**
   * Set this logger's own level. A child stops following its parent.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    this.parent = null;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  /**
   * Logger for a component, prefixed "[parent:component]".
   * It follows this logger's level, including later changes.
   */
  child(component: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${component}` : component, this);
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.write('error', message, data);
  }

  private write(level: EmittingLevel, message: string, data: LogData | undefined): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) return;

    const { tag, color, sink } = LEVEL_STYLES[level];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    sink(color(`[${tag}] ${text}`));
    if (data !== undefined) {
      sink(color(formatData(data)));
    }
  }
}

export const logger = new Logger();

export { Logger };
