/**
 * Simple logger for core package
 * Uses debug levels for granular control
 */

import { redactUrl } from '@jellyfzf/shared';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

class CoreLogger {
  private level: LogLevel;

  constructor() {
    const envLevel = process.env.LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : 'warn';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, component: string, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    // Stream URLs carry the access token as a query parameter
    const contextStr = context ? ` ${redactUrl(JSON.stringify(context))}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${component}] ${redactUrl(message)}${contextStr}`;
  }

  debug(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', component, message, context));
    }
  }

  info(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', component, message, context));
    }
  }

  warn(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', component, message, context));
    }
  }

  error(component: string, message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      const errorInfo = error instanceof Error
        ? { errorName: error.name, errorMessage: error.message, stack: this.level === 'debug' ? error.stack : undefined }
        : undefined;
      console.error(this.format('error', component, message, { ...context, ...errorInfo }));
    }
  }
}

export const logger = new CoreLogger();
