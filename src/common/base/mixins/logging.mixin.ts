import { Logger } from "@nestjs/common";
import { ConsensusEngineError } from "../../errors/consensus-engine.errors";
import { EnhancedLoggerService } from "../../logging/enhanced-logger.service";
import type { Constructor } from "../../types/services/mixins";

export interface LoggingCapabilities {
  readonly logger: Logger;
  enhancedLogger?: EnhancedLoggerService;
  initializeEnhancedLogging(useEnhancedLogging: boolean): void;
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logPerformance(operation: string, duration: number, threshold?: number): void;
  logError(error: unknown, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
  logCriticalOperation(operation: string, details: Record<string, unknown>, success?: boolean): void;
  startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void;
  endPerformanceTimer(operationId: string, success?: boolean, additionalMetadata?: Record<string, unknown>): void;
}

function withContext(message: string, context?: string): string {
  return context ? `[${context}] ${message}` : message;
}

/**
 * Nest Logger named after the concrete class, plus the structured enhanced logger when a service turns it on.
 * Critical operations (publishes, slashes, halts) go to the enhanced logger's audit trail when it is present.
 */
export function WithLogging<TBase extends Constructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;
    public enhancedLogger?: EnhancedLoggerService;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    initializeEnhancedLogging(useEnhancedLogging: boolean): void {
      this.enhancedLogger = useEnhancedLogging ? new EnhancedLoggerService(this.constructor.name) : undefined;
    }

    logInitialization(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} initialized`);
    }

    logShutdown(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} shutting down`);
    }

    logPerformance(operation: string, duration: number, threshold = 1000): void {
      if (duration > threshold) {
        this.logger.warn(`Performance warning: ${operation} took ${duration}ms (threshold: ${threshold}ms)`);
        return;
      }
      this.logger.debug(`${operation} completed in ${duration}ms`);
    }

    logError(error: unknown, context?: string, additionalData?: Record<string, unknown>): void {
      if (error instanceof ConsensusEngineError) {
        this.logger.error(withContext(`${error.code}: ${error.message}`, context), error.stack, {
          severity: error.severity,
          ...error.context,
          ...additionalData,
        });
        return;
      }
      if (error instanceof Error) {
        this.logger.error(withContext(error.message, context), error.stack, additionalData);
        return;
      }
      this.logger.error(withContext(String(error), context), undefined, additionalData);
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      this.logger.warn(withContext(message, context), additionalData);
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      this.logger.debug(withContext(message, context), additionalData);
    }

    logCriticalOperation(operation: string, details: Record<string, unknown>, success = true): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logCriticalOperation(operation, this.constructor.name, details, success);
        return;
      }
      const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
      if (success) {
        this.logger.log(message, details);
      } else {
        this.logger.error(message, details);
      }
    }

    startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void {
      this.enhancedLogger?.startPerformanceTimer(operationId, operation, this.constructor.name, metadata);
    }

    endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
      this.enhancedLogger?.endPerformanceTimer(operationId, success, additionalMetadata);
    }
  };
}
