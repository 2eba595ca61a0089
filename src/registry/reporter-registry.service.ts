import { Inject, Injectable } from "@nestjs/common";
import { ethers } from "ethers";
import { BaseService } from "@/common/base/base.service";
import { RegistryError } from "@/common/errors/consensus-engine.errors";
import { ErrorCode } from "@/common/types/error-handling";
import {
  ReporterStatus,
  type ParticipationEntry,
  type RegistryPolicy,
  type RegistrySnapshot,
  type Reporter,
  type ReporterId,
  type ReporterView,
} from "@/common/types/core";
import { CLOCK, type Clock } from "@/common/utils/clock";
import { ConfigService } from "@/config/config.service";

/**
 * Owned table of reporters keyed by checksummed address. Reporters are never removed.
 *
 * Stake operations (register, deposit, withdraw) come from the HTTP surface; reputation and
 * status changes come only from the slashing manager, after a round is finalized.
 */
@Injectable()
export class ReporterRegistryService extends BaseService {
  private readonly reporters = new Map<ReporterId, Reporter>();
  private readonly policy: RegistryPolicy;

  constructor(
    configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    super({ useEnhancedLogging: true });
    this.policy = { ...configService.getRegistryPolicy() };
  }

  static normalizeId(id: string): ReporterId {
    try {
      return ethers.getAddress(id);
    } catch {
      throw new RegistryError(ErrorCode.INVALID_REPORTER_ID, `Invalid reporter address: ${id}`, { id });
    }
  }

  getPolicy(): Readonly<RegistryPolicy> {
    return this.policy;
  }

  /**
   * Registers a new reporter, or re-activates a slashed one. A re-activated reporter keeps what is
   * left of its stake, adds the new deposit and starts again from the initial reputation.
   */
  register(id: string, stake: number): ReporterView {
    const reporterId = ReporterRegistryService.normalizeId(id);
    this.assertAmount(stake, "stake");
    if (stake < this.policy.minimumStake) {
      throw new RegistryError(
        ErrorCode.STAKE_BELOW_MINIMUM,
        `Stake ${stake} is below the minimum of ${this.policy.minimumStake}`,
        { reporter: reporterId, stake }
      );
    }

    const now = this.clock.now();
    const existing = this.reporters.get(reporterId);

    if (existing && existing.status !== ReporterStatus.Slashed) {
      throw new RegistryError(ErrorCode.REPORTER_ALREADY_REGISTERED, `Reporter ${reporterId} is already registered`, {
        reporter: reporterId,
        status: existing.status,
      });
    }

    const reporter: Reporter = {
      id: reporterId,
      stake: this.addStake(existing?.stake ?? 0, stake),
      reputation: this.policy.initialReputation,
      status: ReporterStatus.Active,
      registeredAt: existing?.registeredAt ?? now,
      updatedAt: now,
      participation: [],
    };
    this.reporters.set(reporterId, reporter);

    this.logCriticalOperation(existing ? "reporter_reactivated" : "reporter_registered", {
      reporter: reporterId,
      stake: reporter.stake,
    });
    return this.toView(reporter);
  }

  deposit(id: string, amount: number): ReporterView {
    const reporter = this.require(id);
    this.assertAmount(amount, "deposit");

    reporter.stake = this.addStake(reporter.stake, amount);
    reporter.updatedAt = this.clock.now();

    this.logCriticalOperation("stake_deposited", { reporter: reporter.id, amount, stake: reporter.stake });
    return this.toView(reporter);
  }

  /**
   * Fails when an active reporter would drop below the minimum stake. Suspended and slashed
   * reporters may withdraw everything they have left.
   */
  withdraw(id: string, amount: number): ReporterView {
    const reporter = this.require(id);
    this.assertAmount(amount, "withdrawal");

    if (amount > reporter.stake) {
      throw new RegistryError(ErrorCode.INVALID_AMOUNT, `Cannot withdraw ${amount}, stake is ${reporter.stake}`, {
        reporter: reporter.id,
        amount,
      });
    }

    const remaining = reporter.stake - amount;
    if (reporter.status === ReporterStatus.Active && remaining < this.policy.minimumStake) {
      throw new RegistryError(
        ErrorCode.STAKE_BELOW_MINIMUM,
        `Withdrawal would leave ${remaining}, below the minimum of ${this.policy.minimumStake}`,
        { reporter: reporter.id, amount, stake: reporter.stake }
      );
    }

    reporter.stake = remaining;
    reporter.updatedAt = this.clock.now();

    this.logCriticalOperation("stake_withdrawn", { reporter: reporter.id, amount, stake: reporter.stake });
    return this.toView(reporter);
  }

  /**
   * Removes `amount` from the stake (never below zero), marks the reporter slashed and clears its window
   */
  slash(id: string, amount: number): ReporterView {
    const reporter = this.require(id);
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new RegistryError(ErrorCode.INVALID_AMOUNT, `Invalid slash amount: ${amount}`, { reporter: reporter.id });
    }

    reporter.stake -= Math.min(amount, reporter.stake);
    reporter.status = ReporterStatus.Slashed;
    reporter.participation = [];
    reporter.updatedAt = this.clock.now();

    this.logCriticalOperation("reporter_slashed", { reporter: reporter.id, amount, stake: reporter.stake });
    return this.toView(reporter);
  }

  /**
   * Adds `delta` to the reputation, clamped to the configured bounds
   */
  adjustReputation(id: string, delta: number): ReporterView {
    const reporter = this.require(id);
    const next = reporter.reputation + delta;
    reporter.reputation = Math.min(this.policy.maxReputation, Math.max(this.policy.minReputation, next));
    reporter.updatedAt = this.clock.now();
    return this.toView(reporter);
  }

  /**
   * Appends to the reporter's sliding window. The window is per feed and measured in round
   * sequences: entries for `entry.feedKey` older than `entry.round - windowRounds + 1` are dropped,
   * whether or not the reporter took part in the rounds between.
   */
  recordParticipation(id: string, entry: ParticipationEntry, windowRounds: number): ReporterView {
    const reporter = this.require(id);
    const oldest = entry.round - windowRounds + 1;
    reporter.participation = reporter.participation.filter(
      existing => existing.feedKey !== entry.feedKey || existing.round >= oldest
    );
    reporter.participation.push({ ...entry });
    return this.toView(reporter);
  }

  suspend(id: string): ReporterView {
    const reporter = this.require(id);
    if (reporter.status !== ReporterStatus.Active) {
      throw new RegistryError(
        ErrorCode.INVALID_STATUS_TRANSITION,
        `Only active reporters can be suspended, ${reporter.id} is ${reporter.status}`,
        { reporter: reporter.id, status: reporter.status }
      );
    }

    reporter.status = ReporterStatus.Suspended;
    reporter.updatedAt = this.clock.now();
    this.logCriticalOperation("reporter_suspended", { reporter: reporter.id, reputation: reporter.reputation });
    return this.toView(reporter);
  }

  /**
   * Governance action: a suspended reporter becomes active again if it still holds the minimum stake
   */
  reinstate(id: string): ReporterView {
    const reporter = this.require(id);
    if (reporter.status !== ReporterStatus.Suspended) {
      throw new RegistryError(
        ErrorCode.INVALID_STATUS_TRANSITION,
        `Only suspended reporters can be reinstated, ${reporter.id} is ${reporter.status}`,
        { reporter: reporter.id, status: reporter.status }
      );
    }
    if (reporter.stake < this.policy.minimumStake) {
      throw new RegistryError(
        ErrorCode.STAKE_BELOW_MINIMUM,
        `Stake ${reporter.stake} is below the minimum of ${this.policy.minimumStake}`,
        { reporter: reporter.id }
      );
    }

    reporter.status = ReporterStatus.Active;
    reporter.updatedAt = this.clock.now();
    this.logCriticalOperation("reporter_reinstated", { reporter: reporter.id });
    return this.toView(reporter);
  }

  get(id: string): ReporterView | undefined {
    let reporterId: ReporterId;
    try {
      reporterId = ReporterRegistryService.normalizeId(id);
    } catch {
      return undefined;
    }
    const reporter = this.reporters.get(reporterId);
    return reporter ? this.toView(reporter) : undefined;
  }

  getOrThrow(id: string): ReporterView {
    return this.toView(this.require(id));
  }

  list(status?: ReporterStatus): ReporterView[] {
    return [...this.reporters.values()]
      .filter(reporter => status === undefined || reporter.status === status)
      .map(reporter => this.toView(reporter));
  }

  size(): number {
    return this.reporters.size;
  }

  /**
   * Frozen copy of every reporter, taken when a round opens
   */
  snapshot(): RegistrySnapshot {
    const snapshot = new Map<ReporterId, ReporterView>();
    for (const reporter of this.reporters.values()) {
      snapshot.set(reporter.id, this.toView(reporter));
    }
    return snapshot;
  }

  private require(id: string): Reporter {
    const reporterId = ReporterRegistryService.normalizeId(id);
    const reporter = this.reporters.get(reporterId);
    if (!reporter) {
      throw new RegistryError(ErrorCode.REPORTER_NOT_FOUND, `Reporter not registered: ${reporterId}`, {
        reporter: reporterId,
      });
    }
    return reporter;
  }

  private assertAmount(amount: number, label: string): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new RegistryError(ErrorCode.INVALID_AMOUNT, `Invalid ${label} amount: ${amount}`, { amount });
    }
  }

  private addStake(current: number, amount: number): number {
    const total = current + amount;
    if (!Number.isSafeInteger(total)) {
      throw new RegistryError(ErrorCode.INVALID_AMOUNT, `Stake would exceed the supported range`, { current, amount });
    }
    return total;
  }

  private toView(reporter: Reporter): ReporterView {
    return Object.freeze({
      ...reporter,
      participation: Object.freeze(reporter.participation.map(entry => Object.freeze({ ...entry }))),
    });
  }
}
