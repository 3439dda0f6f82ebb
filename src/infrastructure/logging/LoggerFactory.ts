/**
 * Logger Factory
 * Creates logger instances with service names
 */

import { LogLevel } from "../../core/interfaces/ILogger.js";
import { ConsoleLogger } from "./ConsoleLogger.js";

export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static level: LogLevel = LogLevel.INFO;

  /**
   * Set the minimum level for every logger, cached or created later
   */
  static setLevel(level: LogLevel): void {
    this.level = level;
    for (const logger of this.loggers.values()) {
      logger.setLevel(level);
    }
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Get or create a logger for a specific service/module
   */
  static getLogger(serviceName: string): ConsoleLogger {
    const cached = this.loggers.get(serviceName);
    if (cached) {
      return cached;
    }
    const logger = new ConsoleLogger(serviceName, this.level);
    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Create a new logger instance (doesn't cache)
   */
  static createLogger(serviceName: string): ConsoleLogger {
    return new ConsoleLogger(serviceName, this.level);
  }

  /**
   * Clear all cached loggers (useful for testing)
   */
  static clearCache(): void {
    this.loggers.clear();
  }
}
