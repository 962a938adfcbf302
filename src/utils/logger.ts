/**
 * Leveled logger
 *
 * Writes to stderr only: stdout carries the MCP stdio transport.
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.format(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }
}

// Errors stringify to {} under JSON.stringify
function formatMeta(meta: unknown): string {
  if (meta === undefined || meta === null) {
    return '';
  }
  if (meta instanceof Error) {
    return ` ${meta.name}: ${meta.message}`;
  }
  return ` ${JSON.stringify(meta)}`;
}

export const logger = new Logger();
