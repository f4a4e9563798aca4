/**
 * Leveled logger
 *
 * Everything goes to stderr: stdout carries the MCP protocol stream.
 */

import type { LogLevel } from '../types/config.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function serializeMeta(meta: unknown): string {
  if (meta === undefined || meta === null) return '';
  if (meta instanceof Error) {
    return ` ${JSON.stringify({ name: meta.name, message: meta.message })}`;
  }
  return ` ${JSON.stringify(meta)}`;
}

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
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

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [${level.toUpperCase()}] ${message}${serializeMeta(meta)}`);
  }
}

export const logger = new Logger();
