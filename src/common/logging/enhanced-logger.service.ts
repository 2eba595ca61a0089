import * as fs from "fs";
import * as path from "path";
import { Injectable, Logger } from "@nestjs/common";
import { shouldLog, type AuditLogEntry, type EnhancedLogContext, type LogLevel } from "../types/logging";
import { PerformanceLogger } from "./performance-logger";

import { ENV } from "@/config/environment.constants";

/**
 * Structured logger for services that opt into it. Adds the process id to every line, honours
 * LOG_LEVEL on its own, and appends critical operations to `audit.log` when file logging is on.
 */
@Injectable()
export class EnhancedLoggerService {
  private readonly logger: Logger;
  private readonly level: LogLevel = ENV.LOGGING.LOG_LEVEL;
  private readonly fileLogging: boolean = ENV.LOGGING.ENABLE_FILE_LOGGING;
  private readonly directory = path.join(process.cwd(), ENV.LOGGING.LOG_DIRECTORY);
  private readonly timers: PerformanceLogger;

  constructor(context = "EnhancedLogger") {
    this.logger = new Logger(context);
    if (this.fileLogging) {
      this.ensureDirectory();
    }
    this.timers = new PerformanceLogger(
      context,
      this.directory,
      ENV.LOGGING.ENABLE_PERFORMANCE_LOGGING,
      this.fileLogging
    );
  }

  log(message: string, context?: EnhancedLogContext): void {
    if (this.enabled("log")) this.logger.log(message, this.decorate(context));
  }

  warn(message: string, context?: EnhancedLogContext): void {
    if (this.enabled("warn")) this.logger.warn(message, this.decorate(context));
  }

  debug(message: string, context?: EnhancedLogContext): void {
    if (this.enabled("debug")) this.logger.debug(message, this.decorate(context));
  }

  error(message: string | Error, context?: EnhancedLogContext): void {
    if (!this.enabled("error")) {
      return;
    }
    if (typeof message === "string") {
      this.logger.error(message, this.decorate(context));
    } else {
      this.logger.error(message.message, message.stack, this.decorate({ ...context, errorName: message.name }));
    }
  }

  logCriticalOperation(operation: string, component: string, details: Record<string, unknown>, success = true): void {
    const summary = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
    const context: EnhancedLogContext = { component, operation, severity: success ? "low" : "high", metadata: details };
    if (success) {
      this.log(summary, context);
    } else {
      this.error(summary, context);
    }

    if (this.fileLogging) {
      this.appendAudit({ timestamp: Date.now(), operation, component, success, details });
    }
  }

  startPerformanceTimer(operationId: string, operation: string, component: string, metadata?: Record<string, unknown>): void {
    this.timers.startTimer(operationId, operation, component, metadata);
  }

  endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
    this.timers.endTimer(operationId, success, additionalMetadata);
  }

  private enabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private decorate(context?: EnhancedLogContext): EnhancedLogContext {
    return { pid: process.pid, ...context };
  }

  private ensureDirectory(): void {
    try {
      fs.mkdirSync(this.directory, { recursive: true });
    } catch (error) {
      this.logger.error(`Failed to create log directory ${this.directory}`, error);
    }
  }

  private appendAudit(entry: AuditLogEntry): void {
    try {
      fs.appendFileSync(path.join(this.directory, "audit.log"), `${JSON.stringify(entry)}\n`);
    } catch (error) {
      this.logger.error("Failed to write audit log entry", error);
    }
  }
}
