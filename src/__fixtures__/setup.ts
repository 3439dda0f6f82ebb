import { LogLevel } from "../core/interfaces/ILogger.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";

// Keep test output readable; errors still show
LoggerFactory.setLevel(LogLevel.ERROR);
