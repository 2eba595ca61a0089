/**
 * Config Service
 * Loads feed definitions from feeds.json, merges the ENV defaults and validates the engine settings
 */

import { readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { Inject, Injectable, Optional } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { ConfigurationError } from "@/common/errors/consensus-engine.errors";
import { FeedIdEncoder } from "@/common/utils/feed-id.utils";
import {
  isValidCoreFeedId,
  type AuditSettings,
  type CoreFeedId,
  type FeedDefinition,
  type FeedParameters,
  type RegistryPolicy,
  type SlashingPolicy,
} from "@/common/types/core";
import { ENV } from "./environment.constants";

export const ENGINE_SETTINGS_OVERRIDES = "ENGINE_SETTINGS_OVERRIDES";

export interface EngineSettings {
  feeds: FeedDefinition[];
  defaults: FeedParameters;
  registry: RegistryPolicy;
  slashing: SlashingPolicy;
  audit: AuditSettings;
  scheduleDeadlines: boolean;
}

/**
 * Values that take precedence over feeds.json and the environment. Tests build the service with these.
 */
export interface EngineSettingsOverrides {
  feeds?: FeedDefinition[];
  defaults?: Partial<FeedParameters>;
  registry?: Partial<RegistryPolicy>;
  slashing?: Partial<SlashingPolicy>;
  audit?: Partial<AuditSettings>;
  scheduleDeadlines?: boolean;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const PARAMETER_KEYS: readonly (keyof FeedParameters)[] = [
  "minQuorum",
  "roundDurationMs",
  "toleranceMultiplier",
  "madFloor",
  "minAgreement",
  "maxClockSkewMs",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

@Injectable()
export class ConfigService extends BaseService {
  private readonly settings: EngineSettings;

  constructor(@Optional() @Inject(ENGINE_SETTINGS_OVERRIDES) overrides?: EngineSettingsOverrides) {
    super({ useEnhancedLogging: true });

    const defaults: FeedParameters = {
      minQuorum: ENV.CONSENSUS.MIN_QUORUM,
      roundDurationMs: ENV.CONSENSUS.ROUND_DURATION_MS,
      toleranceMultiplier: ENV.CONSENSUS.TOLERANCE_MULTIPLIER,
      madFloor: ENV.CONSENSUS.MAD_FLOOR,
      minAgreement: ENV.CONSENSUS.MIN_AGREEMENT,
      maxClockSkewMs: ENV.CONSENSUS.MAX_CLOCK_SKEW_MS,
      ...overrides?.defaults,
    };

    this.settings = {
      feeds: overrides?.feeds ?? this.loadFeedDefinitions(defaults),
      defaults,
      registry: {
        minimumStake: ENV.REGISTRY.MIN_STAKE,
        initialReputation: ENV.REGISTRY.INITIAL_REPUTATION,
        minReputation: ENV.REGISTRY.MIN_REPUTATION,
        maxReputation: ENV.REGISTRY.MAX_REPUTATION,
        suspensionThreshold: ENV.REGISTRY.SUSPENSION_THRESHOLD,
        ...overrides?.registry,
      },
      slashing: {
        outlierPenalty: ENV.SLASHING.OUTLIER_PENALTY,
        honestReward: ENV.SLASHING.HONEST_REWARD,
        windowRounds: ENV.SLASHING.WINDOW_ROUNDS,
        repeatOffenseThreshold: ENV.SLASHING.REPEAT_OFFENSE_THRESHOLD,
        slashFractionBps: ENV.SLASHING.FRACTION_BPS,
        ...overrides?.slashing,
      },
      audit: {
        retentionRounds: ENV.AUDIT.RETENTION_ROUNDS,
        historyLength: ENV.AUDIT.HISTORY_LENGTH,
        ...overrides?.audit,
      },
      scheduleDeadlines: overrides?.scheduleDeadlines ?? ENV.CONSENSUS.SCHEDULE_DEADLINES,
    };

    const result = this.validateConfiguration();
    result.warnings.forEach(warning => this.logWarning(warning, "ConfigService"));
    if (!result.isValid) {
      throw new ConfigurationError(`Invalid engine configuration: ${result.errors.join("; ")}`, result.errors);
    }

    this.logger.log(`Engine configuration loaded: ${this.settings.feeds.length} feeds`);
  }

  getEngineSettings(): Readonly<EngineSettings> {
    return this.settings;
  }

  getFeedDefinitions(): FeedDefinition[] {
    return this.settings.feeds.map(definition => ({
      feed: { ...definition.feed },
      parameters: { ...definition.parameters },
    }));
  }

  getRegistryPolicy(): Readonly<RegistryPolicy> {
    return this.settings.registry;
  }

  getSlashingPolicy(): Readonly<SlashingPolicy> {
    return this.settings.slashing;
  }

  getAuditSettings(): Readonly<AuditSettings> {
    return this.settings.audit;
  }

  validateConfiguration(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { feeds, registry, slashing, audit } = this.settings;

    const seen = new Set<string>();
    for (const definition of feeds) {
      const label = `${definition.feed.category}:${definition.feed.name}`;
      let key: string;
      try {
        key = FeedIdEncoder.toKey(definition.feed);
      } catch (error) {
        errors.push(`Feed ${label}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }
      if (seen.has(key)) {
        errors.push(`Feed ${label} is defined more than once`);
      }
      seen.add(key);
      errors.push(...ConfigService.validateParameters(label, definition.parameters));

      if (definition.parameters.minAgreement > definition.parameters.minQuorum) {
        warnings.push(`Feed ${label}: minAgreement exceeds minQuorum, quorum-closed rounds cannot publish`);
      }
    }
    if (feeds.length === 0) {
      warnings.push("No feeds configured");
    }

    if (!Number.isSafeInteger(registry.minimumStake) || registry.minimumStake < 0) {
      errors.push(`Invalid minimum stake: ${registry.minimumStake}`);
    }
    if (registry.minReputation > registry.maxReputation) {
      errors.push("Reputation bounds are inverted");
    }
    if (registry.initialReputation < registry.minReputation || registry.initialReputation > registry.maxReputation) {
      errors.push(`Initial reputation ${registry.initialReputation} is outside the reputation bounds`);
    }
    if (registry.suspensionThreshold > registry.initialReputation) {
      warnings.push("Suspension threshold is above the initial reputation, new reporters will be suspended");
    }

    if (!Number.isInteger(slashing.windowRounds) || slashing.windowRounds < 1) {
      errors.push(`Invalid slashing window: ${slashing.windowRounds}`);
    }
    if (!Number.isInteger(slashing.repeatOffenseThreshold) || slashing.repeatOffenseThreshold < 0) {
      errors.push(`Invalid repeat offense threshold: ${slashing.repeatOffenseThreshold}`);
    } else if (slashing.repeatOffenseThreshold >= slashing.windowRounds) {
      warnings.push("Repeat offense threshold is not below the window size, reporters can never be slashed");
    }
    if (!Number.isInteger(slashing.slashFractionBps) || slashing.slashFractionBps < 0 || slashing.slashFractionBps > 10000) {
      errors.push(`Invalid slash fraction: ${slashing.slashFractionBps} bps`);
    }
    if (slashing.outlierPenalty < 0 || slashing.honestReward < 0) {
      errors.push("Outlier penalty and honest reward cannot be negative");
    }

    if (!Number.isInteger(audit.retentionRounds) || audit.retentionRounds < 1) {
      errors.push(`Invalid audit retention: ${audit.retentionRounds}`);
    }
    if (!Number.isInteger(audit.historyLength) || audit.historyLength < 1) {
      errors.push(`Invalid history length: ${audit.historyLength}`);
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  static validateParameters(label: string, parameters: FeedParameters): string[] {
    const errors: string[] = [];
    const requireInteger = (name: keyof FeedParameters, min: number): void => {
      const value = parameters[name];
      if (!Number.isInteger(value) || value < min) {
        errors.push(`Feed ${label}: ${name} must be an integer of at least ${min}, got ${value}`);
      }
    };

    requireInteger("minQuorum", 1);
    requireInteger("roundDurationMs", 1);
    requireInteger("minAgreement", 1);
    requireInteger("maxClockSkewMs", 0);

    if (!Number.isFinite(parameters.toleranceMultiplier) || parameters.toleranceMultiplier <= 0) {
      errors.push(`Feed ${label}: toleranceMultiplier must be positive, got ${parameters.toleranceMultiplier}`);
    }
    if (!Number.isFinite(parameters.madFloor) || parameters.madFloor < 0) {
      errors.push(`Feed ${label}: madFloor cannot be negative, got ${parameters.madFloor}`);
    }
    return errors;
  }

  private loadFeedDefinitions(defaults: FeedParameters): FeedDefinition[] {
    const file = ENV.APPLICATION.FEEDS_FILE;
    const feedsFilePath = isAbsolute(file) ? file : join(process.cwd(), file);

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(feedsFilePath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load feed definitions from ${feedsFilePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const { definitions, errors } = ConfigService.parseFeedDefinitions(raw, defaults);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid feed definitions in ${feedsFilePath}`, errors);
    }
    return definitions;
  }

  /**
   * Turns the raw feeds.json content into definitions. Missing parameters take the defaults.
   */
  static parseFeedDefinitions(
    raw: unknown,
    defaults: FeedParameters
  ): { definitions: FeedDefinition[]; errors: string[] } {
    const definitions: FeedDefinition[] = [];
    const errors: string[] = [];

    if (!Array.isArray(raw)) {
      return { definitions, errors: ["Feed definitions must be a JSON array"] };
    }

    raw.forEach((entry: unknown, index: number) => {
      if (!isRecord(entry) || !isValidCoreFeedId(entry.feed)) {
        errors.push(`Entry ${index}: missing or invalid feed id`);
        return;
      }

      const parameters: FeedParameters = { ...defaults };
      const rawParameters = entry.parameters ?? {};
      if (!isRecord(rawParameters)) {
        errors.push(`Entry ${index}: parameters must be an object`);
        return;
      }
      for (const key of PARAMETER_KEYS) {
        const value = rawParameters[key];
        if (value === undefined) continue;
        if (typeof value !== "number") {
          errors.push(`Entry ${index}: ${key} must be a number`);
          continue;
        }
        parameters[key] = value;
      }

      definitions.push({ feed: { category: entry.feed.category, name: entry.feed.name }, parameters });
    });

    return { definitions, errors };
  }
}
