import type { LogLevel } from "@nestjs/common";

export type { LogLevel };

// Lower is more severe; a message is written when its rank is at or below the configured one.
const RANK: Record<LogLevel, number> = { fatal: 0, error: 1, warn: 2, log: 3, debug: 4, verbose: 5 };

const ORDERED = Object.keys(RANK).filter(isLogLevel);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return RANK[messageLevel] <= RANK[currentLevel];
}

/** Levels NestFactory and ConsoleLogger should enable for a LOG_LEVEL setting. */
export function getEnabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return ORDERED.filter(level => shouldLog(level, currentLevel));
}

export interface EnhancedLogContext {
  component?: string;
  operation?: string;
  severity?: "low" | "medium" | "high" | "critical";
  metadata?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface PerformanceLogEntry {
  operation: string;
  component: string;
  /** performance.now() readings, in milliseconds */
  startTime: number;
  endTime: number;
  duration: number;
  success: boolean;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface AuditLogEntry {
  timestamp: number;
  operation: string;
  component: string;
  success: boolean;
  details: Record<string, unknown>;
}
