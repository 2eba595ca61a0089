import * as fs from "fs";
import * as path from "path";
import { Logger } from "@nestjs/common";
import type { PerformanceLogEntry } from "../types/logging";

type OpenTimer = Omit<PerformanceLogEntry, "endTime" | "duration" | "success">;

/**
 * Named start/stop timers. Finished timings go to debug (or warn when the operation failed) and,
 * with file logging on, to `performance.log` as one JSON object per line.
 */
export class PerformanceLogger {
  private readonly logger: Logger;
  private readonly open = new Map<string, OpenTimer>();

  constructor(
    context: string,
    private readonly directory: string,
    private readonly enabled = true,
    private readonly toFile = false
  ) {
    this.logger = new Logger(`${context}:Performance`);
  }

  startTimer(operationId: string, operation: string, component: string, metadata?: Record<string, unknown>): void {
    if (this.enabled) {
      this.open.set(operationId, { operation, component, startTime: performance.now(), timestamp: Date.now(), metadata });
    }
  }

  endTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
    if (!this.enabled) {
      return;
    }
    const timer = this.open.get(operationId);
    if (!timer) {
      this.logger.warn(`Performance timer not found for operation: ${operationId}`);
      return;
    }
    this.open.delete(operationId);

    const endTime = performance.now();
    const entry: PerformanceLogEntry = {
      ...timer,
      endTime,
      duration: endTime - timer.startTime,
      success,
      metadata: additionalMetadata ? { ...timer.metadata, ...additionalMetadata } : timer.metadata,
    };

    const line = `Performance: ${entry.operation} completed in ${entry.duration.toFixed(2)}ms`;
    if (success) {
      this.logger.debug(line);
    } else {
      this.logger.warn(`${line} (FAILED)`);
    }

    if (this.toFile) {
      this.append(entry);
    }
  }

  private append(entry: PerformanceLogEntry): void {
    const record = { ...entry, timestamp: new Date(entry.timestamp).toISOString() };
    try {
      fs.appendFileSync(path.join(this.directory, "performance.log"), `${JSON.stringify(record)}\n`);
    } catch (error) {
      this.logger.error("Failed to write performance log", error);
    }
  }
}
