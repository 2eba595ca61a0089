/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

const logLevel = EnvironmentUtils.parseString("LOG_LEVEL", "log");

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, {
      min: 1,
      max: 65535,
    }),
    FEEDS_FILE: EnvironmentUtils.parseString("FEEDS_FILE", "src/config/feeds.json"),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: (isLogLevel(logLevel) ? logLevel : "log") satisfies LogLevel,
    LOG_DIRECTORY: EnvironmentUtils.parseString("LOG_DIRECTORY", "logs"),
    ENABLE_FILE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_FILE_LOGGING", false),
    ENABLE_PERFORMANCE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_PERFORMANCE_LOGGING", false),
  },

  // Consensus defaults, overridable per feed in feeds.json
  CONSENSUS: {
    MIN_QUORUM: EnvironmentUtils.parseInt("CONSENSUS_MIN_QUORUM", 3, { min: 1, max: 1000 }),
    ROUND_DURATION_MS: EnvironmentUtils.parseInt("CONSENSUS_ROUND_DURATION_MS", 90000, { min: 1000, max: 3600000 }),
    TOLERANCE_MULTIPLIER: EnvironmentUtils.parseFloat("CONSENSUS_TOLERANCE_MULTIPLIER", 3, { min: 0.1, max: 100 }),
    MAD_FLOOR: EnvironmentUtils.parseFloat("CONSENSUS_MAD_FLOOR", 0.000001, { min: 0 }),
    MIN_AGREEMENT: EnvironmentUtils.parseInt("CONSENSUS_MIN_AGREEMENT", 3, { min: 1, max: 1000 }),
    MAX_CLOCK_SKEW_MS: EnvironmentUtils.parseInt("CONSENSUS_MAX_CLOCK_SKEW_MS", 5000, { min: 0, max: 60000 }),
    SCHEDULE_DEADLINES: EnvironmentUtils.parseBoolean("CONSENSUS_SCHEDULE_DEADLINES", true),
  },

  // Reporter registry
  REGISTRY: {
    MIN_STAKE: EnvironmentUtils.parseInt("REGISTRY_MIN_STAKE", 1000, { min: 0 }),
    INITIAL_REPUTATION: EnvironmentUtils.parseFloat("REGISTRY_INITIAL_REPUTATION", 50),
    MIN_REPUTATION: EnvironmentUtils.parseFloat("REGISTRY_MIN_REPUTATION", 0),
    MAX_REPUTATION: EnvironmentUtils.parseFloat("REGISTRY_MAX_REPUTATION", 100),
    SUSPENSION_THRESHOLD: EnvironmentUtils.parseFloat("REGISTRY_SUSPENSION_THRESHOLD", 10),
  },

  // Reputation and slashing
  SLASHING: {
    OUTLIER_PENALTY: EnvironmentUtils.parseFloat("SLASHING_OUTLIER_PENALTY", 5, { min: 0 }),
    HONEST_REWARD: EnvironmentUtils.parseFloat("SLASHING_HONEST_REWARD", 1, { min: 0 }),
    WINDOW_ROUNDS: EnvironmentUtils.parseInt("SLASHING_WINDOW_ROUNDS", 10, { min: 1, max: 10000 }),
    REPEAT_OFFENSE_THRESHOLD: EnvironmentUtils.parseInt("SLASHING_REPEAT_OFFENSE_THRESHOLD", 3, { min: 0 }),
    FRACTION_BPS: EnvironmentUtils.parseInt("SLASHING_FRACTION_BPS", 1000, { min: 0, max: 10000 }),
  },

  // Round audit retention
  AUDIT: {
    RETENTION_ROUNDS: EnvironmentUtils.parseInt("AUDIT_RETENTION_ROUNDS", 50, { min: 1, max: 10000 }),
    HISTORY_LENGTH: EnvironmentUtils.parseInt("AUDIT_HISTORY_LENGTH", 100, { min: 1, max: 100000 }),
  },
} as const;
