import { Injectable } from "@nestjs/common";
import { EventService } from "@/common/base/composed.service";
import {
  ReporterStatus,
  RoundOutcomeKind,
  type FinalizedRoundReport,
  type ReporterId,
  type SlashingPolicy,
} from "@/common/types/core";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { ConfigService } from "@/config/config.service";

export const SLASHING_EVENTS = {
  REPORTER_SLASHED: "reporter.slashed",
  REPORTER_SUSPENDED: "reporter.suspended",
} as const;

export interface ReporterSlashedEvent {
  reporter: ReporterId;
  feedKey: string;
  sequence: number;
  flags: number;
  windowRounds: number;
  amount: number;
  remainingStake: number;
  at: number;
}

export interface ReporterSuspendedEvent {
  reporter: ReporterId;
  feedKey: string;
  sequence: number;
  reputation: number;
  at: number;
}

export interface SlashingReport {
  feedKey: string;
  sequence: number;
  penalized: ReporterId[];
  rewarded: ReporterId[];
  slashed: ReporterSlashedEvent[];
  suspended: ReporterId[];
}

/**
 * floor(stake * bps / 10000) without losing precision on large stakes
 */
export function computeSlashAmount(stake: number, fractionBps: number): number {
  return Number((BigInt(stake) * BigInt(fractionBps)) / 10000n);
}

/**
 * Applies reputation and stake consequences of a published round. Touches only the registry.
 */
@Injectable()
export class AnomalySlashingService extends EventService {
  private readonly policy: SlashingPolicy;

  constructor(
    private readonly registry: ReporterRegistryService,
    configService: ConfigService
  ) {
    super({ useEnhancedLogging: true });
    this.policy = { ...configService.getSlashingPolicy() };
  }

  getPolicy(): Readonly<SlashingPolicy> {
    return this.policy;
  }

  applyRoundReport(report: FinalizedRoundReport): SlashingReport {
    const result: SlashingReport = {
      feedKey: report.feedKey,
      sequence: report.sequence,
      penalized: [],
      rewarded: [],
      slashed: [],
      suspended: [],
    };

    const outcome = report.outcome;
    if (outcome.kind !== RoundOutcomeKind.Published) {
      return result;
    }

    const anyOutlier = outcome.scored.some(entry => entry.outlier);
    const { suspensionThreshold } = this.registry.getPolicy();

    for (const entry of outcome.scored) {
      const reporterId = entry.submission.reporter;
      if (!this.registry.get(reporterId)) {
        this.logWarning(`Reporter ${reporterId} from round ${report.sequence} is no longer registered`, "slashing");
        continue;
      }

      const view = this.registry.recordParticipation(
        reporterId,
        { feedKey: report.feedKey, round: report.sequence, outlier: entry.outlier },
        this.policy.windowRounds
      );

      if (!entry.outlier) {
        if (anyOutlier) {
          this.registry.adjustReputation(reporterId, this.policy.honestReward);
          result.rewarded.push(reporterId);
        }
        continue;
      }

      const penalized = this.registry.adjustReputation(reporterId, -this.policy.outlierPenalty);
      result.penalized.push(reporterId);

      const oldest = report.sequence - this.policy.windowRounds + 1;
      const flags = view.participation.filter(
        participation => participation.outlier && participation.feedKey === report.feedKey && participation.round >= oldest
      ).length;
      if (flags > this.policy.repeatOffenseThreshold && penalized.status !== ReporterStatus.Slashed) {
        result.slashed.push(this.slash(reporterId, penalized.stake, flags, report));
        continue;
      }

      if (penalized.status === ReporterStatus.Active && penalized.reputation < suspensionThreshold) {
        this.registry.suspend(reporterId);
        result.suspended.push(reporterId);

        const event: ReporterSuspendedEvent = {
          reporter: reporterId,
          feedKey: report.feedKey,
          sequence: report.sequence,
          reputation: penalized.reputation,
          at: report.closedAt,
        };
        this.logWarning(`Reporter ${reporterId} suspended at reputation ${penalized.reputation}`, "slashing");
        this.emitWithLogging(SLASHING_EVENTS.REPORTER_SUSPENDED, event);
      }
    }

    return result;
  }

  private slash(reporterId: ReporterId, stake: number, flags: number, report: FinalizedRoundReport): ReporterSlashedEvent {
    const amount = computeSlashAmount(stake, this.policy.slashFractionBps);
    const slashed = this.registry.slash(reporterId, amount);

    const event: ReporterSlashedEvent = {
      reporter: reporterId,
      feedKey: report.feedKey,
      sequence: report.sequence,
      flags,
      windowRounds: this.policy.windowRounds,
      amount,
      remainingStake: slashed.stake,
      at: report.closedAt,
    };

    this.logCriticalOperation("slash_applied", { ...event });
    this.emitWithLogging(SLASHING_EVENTS.REPORTER_SLASHED, event);
    return event;
  }
}
