import { v4 as uuidv4 } from "uuid";
import { BaseService } from "./base.service";
import type { ApiResponse } from "../types/http/http.types";

/**
 * Base controller class consolidates common controller patterns:
 * request ids, timing and the success envelope
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  public generateRequestId(): string {
    return uuidv4();
  }

  /**
   * Execute controller operation with timing. Errors are logged and rethrown for the exception filter.
   */
  protected async executeOperation<T>(
    operation: () => T | Promise<T>,
    operationName: string,
    options: { requestId?: string; performanceThreshold?: number } = {}
  ): Promise<ApiResponse<T>> {
    const { requestId = this.generateRequestId(), performanceThreshold = 1000 } = options;
    const start = performance.now();

    try {
      this.logger.debug(`Starting ${operationName}`, { requestId });
      const data = await operation();
      const responseTime = Math.round((performance.now() - start) * 100) / 100;
      this.logPerformance(operationName, responseTime, performanceThreshold);

      return { success: true, timestamp: Date.now(), requestId, responseTime, data };
    } catch (error) {
      const responseTime = performance.now() - start;
      this.logDebug(`${operationName} failed after ${responseTime.toFixed(2)}ms`, requestId);
      throw error;
    }
  }

  protected getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startupTime) / 1000);
  }
}
