import { RegistryError } from "@/common/errors/consensus-engine.errors";
import { ErrorCode } from "@/common/types/error-handling";
import { ReporterStatus } from "@/common/types/core";
import { ConfigService } from "@/config/config.service";
import { ManualClock, TestDataBuilder } from "@/__tests__/utils";
import { ReporterRegistryService } from "../reporter-registry.service";

function expectRegistryError(fn: () => unknown, code: ErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(RegistryError);
  expect(caught).toHaveProperty("code", code);
}

describe("ReporterRegistryService", () => {
  const alice = TestDataBuilder.createWallet(1).address;
  const bob = TestDataBuilder.createWallet(2).address;
  let clock: ManualClock;
  let registry: ReporterRegistryService;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    const config = new ConfigService({
      feeds: [],
      registry: {
        minimumStake: 1000,
        initialReputation: 50,
        minReputation: 0,
        maxReputation: 100,
        suspensionThreshold: 10,
      },
    });
    registry = new ReporterRegistryService(config, clock);
  });

  describe("register", () => {
    it("should register an active reporter with the initial reputation", () => {
      const reporter = registry.register(alice, 1500);

      expect(reporter).toEqual({
        id: alice,
        stake: 1500,
        reputation: 50,
        status: ReporterStatus.Active,
        registeredAt: 1_000,
        updatedAt: 1_000,
        participation: [],
      });
      expect(registry.size()).toBe(1);
    });

    it("should key reporters by checksummed address", () => {
      registry.register(alice.toLowerCase(), 1000);
      expect(registry.get(alice)?.id).toBe(alice);
    });

    it("should reject stake below the minimum", () => {
      expectRegistryError(() => registry.register(alice, 999), ErrorCode.STAKE_BELOW_MINIMUM);
    });

    it("should reject invalid addresses and amounts", () => {
      expectRegistryError(() => registry.register("0x1234", 1000), ErrorCode.INVALID_REPORTER_ID);
      expectRegistryError(() => registry.register(alice, 1000.5), ErrorCode.INVALID_AMOUNT);
      expectRegistryError(() => registry.register(alice, -5), ErrorCode.INVALID_AMOUNT);
    });

    it("should reject a second registration of an active reporter", () => {
      registry.register(alice, 1000);
      expectRegistryError(() => registry.register(alice, 1000), ErrorCode.REPORTER_ALREADY_REGISTERED);
    });

    it("should re-activate a slashed reporter with its residual stake and the initial reputation", () => {
      registry.register(alice, 2000);
      registry.adjustReputation(alice, -30);
      registry.slash(alice, 500);
      clock.advance(5_000);

      const reporter = registry.register(alice, 1000);

      expect(reporter.status).toBe(ReporterStatus.Active);
      expect(reporter.stake).toBe(2500);
      expect(reporter.reputation).toBe(50);
      expect(reporter.registeredAt).toBe(1_000);
      expect(reporter.updatedAt).toBe(6_000);
    });
  });

  describe("stake", () => {
    beforeEach(() => {
      registry.register(alice, 1500);
    });

    it("should add deposits", () => {
      expect(registry.deposit(alice, 250).stake).toBe(1750);
    });

    it("should let an active reporter withdraw down to the minimum", () => {
      expect(registry.withdraw(alice, 500).stake).toBe(1000);
      expectRegistryError(() => registry.withdraw(alice, 1), ErrorCode.STAKE_BELOW_MINIMUM);
    });

    it("should let a suspended reporter withdraw everything", () => {
      registry.suspend(alice);
      expect(registry.withdraw(alice, 1500).stake).toBe(0);
    });

    it("should reject withdrawing more than the stake", () => {
      expectRegistryError(() => registry.withdraw(alice, 1501), ErrorCode.INVALID_AMOUNT);
    });

    it("should fail for unknown reporters", () => {
      expectRegistryError(() => registry.deposit(bob, 10), ErrorCode.REPORTER_NOT_FOUND);
    });
  });

  describe("slash", () => {
    it("should reduce the stake, mark the reporter slashed and clear its window", () => {
      registry.register(alice, 1500);
      registry.recordParticipation(alice, { feedKey: "0x01", round: 1, outlier: true }, 10);

      const reporter = registry.slash(alice, 150);

      expect(reporter.stake).toBe(1350);
      expect(reporter.status).toBe(ReporterStatus.Slashed);
      expect(reporter.participation).toEqual([]);
    });

    it("should never take the stake below zero", () => {
      registry.register(alice, 1000);
      expect(registry.slash(alice, 5000).stake).toBe(0);
    });
  });

  describe("reputation and status", () => {
    beforeEach(() => {
      registry.register(alice, 1000);
    });

    it("should clamp reputation to the configured bounds", () => {
      expect(registry.adjustReputation(alice, 80).reputation).toBe(100);
      expect(registry.adjustReputation(alice, -250).reputation).toBe(0);
    });

    it("should keep only the last windowRounds rounds of participation", () => {
      for (let round = 1; round <= 5; round++) {
        registry.recordParticipation(alice, { feedKey: "0x01", round, outlier: round % 2 === 0 }, 3);
      }
      expect(registry.getOrThrow(alice).participation.map(entry => entry.round)).toEqual([3, 4, 5]);
    });

    it("should age the window by round sequence and per feed", () => {
      registry.recordParticipation(alice, { feedKey: "0x01", round: 1, outlier: true }, 3);
      registry.recordParticipation(alice, { feedKey: "0x02", round: 7, outlier: true }, 3);
      registry.recordParticipation(alice, { feedKey: "0x01", round: 40, outlier: false }, 3);

      expect(registry.getOrThrow(alice).participation).toEqual([
        { feedKey: "0x02", round: 7, outlier: true },
        { feedKey: "0x01", round: 40, outlier: false },
      ]);
    });

    it("should suspend active reporters and reinstate suspended ones", () => {
      expect(registry.suspend(alice).status).toBe(ReporterStatus.Suspended);
      expectRegistryError(() => registry.suspend(alice), ErrorCode.INVALID_STATUS_TRANSITION);
      expect(registry.reinstate(alice).status).toBe(ReporterStatus.Active);
      expectRegistryError(() => registry.reinstate(alice), ErrorCode.INVALID_STATUS_TRANSITION);
    });

    it("should not reinstate a reporter below the minimum stake", () => {
      registry.suspend(alice);
      registry.withdraw(alice, 500);
      expectRegistryError(() => registry.reinstate(alice), ErrorCode.STAKE_BELOW_MINIMUM);
    });
  });

  describe("reads", () => {
    it("should hand out frozen views", () => {
      registry.register(alice, 1000);
      const view = registry.getOrThrow(alice);
      expect(Object.isFrozen(view)).toBe(true);
      expect(Object.isFrozen(view.participation)).toBe(true);
    });

    it("should return undefined for unknown or invalid ids", () => {
      expect(registry.get(bob)).toBeUndefined();
      expect(registry.get("not-an-address")).toBeUndefined();
    });

    it("should filter the list by status", () => {
      registry.register(alice, 1000);
      registry.register(bob, 1000);
      registry.suspend(bob);

      expect(registry.list().map(reporter => reporter.id)).toEqual([alice, bob]);
      expect(registry.list(ReporterStatus.Suspended).map(reporter => reporter.id)).toEqual([bob]);
    });

    it("should take snapshots that later writes do not change", () => {
      registry.register(alice, 1000);
      const snapshot = registry.snapshot();

      registry.deposit(alice, 500);

      expect(snapshot.get(alice)?.stake).toBe(1000);
      expect(registry.getOrThrow(alice).stake).toBe(1500);
    });
  });
});
