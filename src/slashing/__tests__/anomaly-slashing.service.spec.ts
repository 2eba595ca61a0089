import {
  ReporterStatus,
  RoundOutcomeKind,
  type FinalizedRoundReport,
  type RoundOutcome,
  type ScoredSubmission,
} from "@/common/types/core";
import { ConfigService, type EngineSettingsOverrides } from "@/config/config.service";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { ManualClock, TestDataBuilder } from "@/__tests__/utils";
import {
  AnomalySlashingService,
  SLASHING_EVENTS,
  computeSlashAmount,
  type ReporterSlashedEvent,
  type ReporterSuspendedEvent,
} from "../anomaly-slashing.service";

describe("AnomalySlashingService", () => {
  const [a, b, c, d] = TestDataBuilder.createWallets(4).map(wallet => wallet.address);
  const feedKey = "0x01544553542f555344000000000000000000000000";
  let registry: ReporterRegistryService;
  let slashing: AnomalySlashingService;

  const setup = (overrides: Partial<EngineSettingsOverrides> = {}): void => {
    const config = new ConfigService({
      feeds: [],
      registry: { minimumStake: 1000, initialReputation: 50, minReputation: 0, maxReputation: 100, suspensionThreshold: 10 },
      slashing: { outlierPenalty: 5, honestReward: 1, windowRounds: 10, repeatOffenseThreshold: 2, slashFractionBps: 1000 },
      ...overrides,
    });
    registry = new ReporterRegistryService(config, new ManualClock(1_000));
    slashing = new AnomalySlashingService(registry, config);
    for (const id of [a, b, c, d]) {
      registry.register(id, 2000);
    }
  };

  const scored = (outliers: string[], reporters: string[] = [a, b, c, d]): ScoredSubmission[] =>
    reporters.map((reporter, index) => ({
      submission: TestDataBuilder.createAcceptedSubmission(reporter, outliers.includes(reporter) ? 500 : 100, index),
      weight: 2000,
      deviation: outliers.includes(reporter) ? 400 : 0,
      outlier: outliers.includes(reporter),
    }));

  const published = (entries: ScoredSubmission[]): RoundOutcome => ({
    kind: RoundOutcomeKind.Published,
    value: 100,
    confidenceInterval: 0,
    median: 100,
    mad: 0,
    threshold: 0.000002,
    inlierCount: entries.filter(entry => !entry.outlier).length,
    scored: entries,
  });

  const report = (sequence: number, outcome: RoundOutcome, key: string = feedKey): FinalizedRoundReport => ({
    feed: TestDataBuilder.createCoreFeedId(),
    feedKey: key,
    sequence,
    closedAt: 1_700_000_000_000 + sequence * 60_000,
    closeReason: "quorum",
    outcome,
    submissions: [],
  });

  beforeEach(() => setup());

  it("should penalize outliers and reward the others in a round with an outlier", () => {
    const result = slashing.applyRoundReport(report(1, published(scored([d]))));

    expect(result.penalized).toEqual([d]);
    expect(result.rewarded).toEqual([a, b, c]);
    expect(registry.getOrThrow(d).reputation).toBe(45);
    expect(registry.getOrThrow(a).reputation).toBe(51);
    expect(registry.getOrThrow(d).participation).toEqual([{ feedKey, round: 1, outlier: true }]);
  });

  it("should record participation but change no reputation when nobody is an outlier", () => {
    const result = slashing.applyRoundReport(report(1, published(scored([]))));

    expect(result.rewarded).toEqual([]);
    expect(result.penalized).toEqual([]);
    expect(registry.getOrThrow(a).reputation).toBe(50);
    expect(registry.getOrThrow(a).participation).toHaveLength(1);
  });

  it("should leave the registry alone for rounds that did not publish", () => {
    const result = slashing.applyRoundReport(
      report(1, { kind: RoundOutcomeKind.InsufficientQuorum, submissionCount: 2 })
    );

    expect(result).toEqual({ feedKey, sequence: 1, penalized: [], rewarded: [], slashed: [], suspended: [] });
    expect(registry.getOrThrow(a).participation).toEqual([]);
  });

  it("should slash a repeat offender exactly once when the window passes the threshold", () => {
    const listener = jest.fn<void, [ReporterSlashedEvent]>();
    slashing.on(SLASHING_EVENTS.REPORTER_SLASHED, listener);

    const slashedPerRound = [1, 2, 3, 4].map(
      sequence => slashing.applyRoundReport(report(sequence, published(scored([d])))).slashed.length
    );

    expect(slashedPerRound).toEqual([0, 0, 1, 0]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toEqual({
      reporter: d,
      feedKey,
      sequence: 3,
      flags: 3,
      windowRounds: 10,
      amount: 200,
      remainingStake: 1800,
      at: 1_700_000_180_000,
    });

    const reporter = registry.getOrThrow(d);
    expect(reporter.status).toBe(ReporterStatus.Slashed);
    expect(reporter.stake).toBe(1800);
    expect(reporter.participation).toEqual([{ feedKey, round: 4, outlier: true }]);
    expect(reporter.reputation).toBe(30);
  });

  it("should forget flags from rounds that have left the window even when the reporter sat them out", () => {
    setup({
      slashing: { outlierPenalty: 5, honestReward: 1, windowRounds: 3, repeatOffenseThreshold: 1, slashFractionBps: 1000 },
    });

    expect(slashing.applyRoundReport(report(1, published(scored([d])))).slashed).toEqual([]);
    expect(slashing.applyRoundReport(report(51, published(scored([d])))).slashed).toEqual([]);
    expect(registry.getOrThrow(d).participation).toEqual([{ feedKey, round: 51, outlier: true }]);

    const next = slashing.applyRoundReport(report(52, published(scored([d]))));
    expect(next.slashed).toEqual([expect.objectContaining({ reporter: d, sequence: 52, flags: 2, windowRounds: 3 })]);
  });

  it("should count flags per feed", () => {
    setup({
      slashing: { outlierPenalty: 5, honestReward: 1, windowRounds: 10, repeatOffenseThreshold: 1, slashFractionBps: 1000 },
    });
    const otherFeedKey = "0x024555522f555344000000000000000000000000";

    expect(slashing.applyRoundReport(report(1, published(scored([d])))).slashed).toEqual([]);
    expect(slashing.applyRoundReport(report(1, published(scored([d])), otherFeedKey)).slashed).toEqual([]);
    expect(registry.getOrThrow(d).status).toBe(ReporterStatus.Active);

    const second = slashing.applyRoundReport(report(2, published(scored([d]))));
    expect(second.slashed).toEqual([expect.objectContaining({ reporter: d, feedKey, flags: 2 })]);
  });

  it("should suspend an active reporter whose reputation falls below the threshold", () => {
    setup({
      registry: { minimumStake: 1000, initialReputation: 12, minReputation: 0, maxReputation: 100, suspensionThreshold: 10 },
    });
    const listener = jest.fn<void, [ReporterSuspendedEvent]>();
    slashing.on(SLASHING_EVENTS.REPORTER_SUSPENDED, listener);

    const result = slashing.applyRoundReport(report(1, published(scored([d]))));

    expect(result.suspended).toEqual([d]);
    expect(registry.getOrThrow(d).status).toBe(ReporterStatus.Suspended);
    expect(listener).toHaveBeenCalledWith({ reporter: d, feedKey, sequence: 1, reputation: 7, at: 1_700_000_060_000 });
  });

  it("should skip reporters that are no longer registered", () => {
    const stranger = TestDataBuilder.createWallet(9).address;

    const result = slashing.applyRoundReport(report(1, published(scored([stranger], [a, b, stranger]))));

    expect(result.penalized).toEqual([]);
    expect(result.rewarded).toEqual([a, b]);
  });

  describe("computeSlashAmount", () => {
    it("should round down", () => {
      expect(computeSlashAmount(1999, 2500)).toBe(499);
      expect(computeSlashAmount(9, 1000)).toBe(0);
    });

    it("should stay exact for large stakes", () => {
      expect(computeSlashAmount(Number.MAX_SAFE_INTEGER, 10000)).toBe(Number.MAX_SAFE_INTEGER);
    });
  });
});
