/**
 * Console Logger Implementation
 * Console-based logger with a minimum level and service tag
 */

import {
  ILogger,
  LogContext,
  LogLevel,
  LOG_LEVEL_ORDER,
} from "../../core/interfaces/ILogger.js";

export class ConsoleLogger implements ILogger {
  private serviceName?: string;
  private minLevel: LogLevel;

  constructor(serviceName?: string, minLevel: LogLevel = LogLevel.INFO) {
    this.serviceName = serviceName;
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const service = this.serviceName ? `[${this.serviceName}]` : "";
    const levelStr = level.toUpperCase().padEnd(7);
    return `${timestamp} ${levelStr} ${service} ${message}`;
  }

  private formatContext(context?: LogContext): string {
    if (!context || Object.keys(context).length === 0) {
      return "";
    }
    return ` ${JSON.stringify(context)}`;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.isEnabled(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message);
    console.debug(formatted + this.formatContext(context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.isEnabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message);
    console.log(formatted + this.formatContext(context));
  }

  warning(message: string, context?: LogContext): void {
    if (!this.isEnabled(LogLevel.WARNING)) return;
    const formatted = this.formatMessage(LogLevel.WARNING, message);
    console.warn(formatted + this.formatContext(context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!this.isEnabled(LogLevel.ERROR)) return;
    const formatted = this.formatMessage(LogLevel.ERROR, message);
    let errorDetails = "";

    if (error instanceof Error) {
      errorDetails = `\n  Error: ${error.message}\n  Stack: ${error.stack}`;
    } else if (error) {
      errorDetails = `\n  Error: ${JSON.stringify(error)}`;
    }

    console.error(formatted + this.formatContext(context) + errorDetails);
  }
}
