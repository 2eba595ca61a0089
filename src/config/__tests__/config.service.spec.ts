import { Test, type TestingModule } from "@nestjs/testing";
import { FeedCategory } from "@/common/types/core";
import { ConfigurationError } from "@/common/errors/consensus-engine.errors";
import { ConfigService, ENGINE_SETTINGS_OVERRIDES } from "../config.service";
import { ConfigModule } from "../config.module";
import { CLOCK, SystemClock } from "@/common/utils/clock";
import { TestDataBuilder } from "@/__tests__/utils/test-data.builders";

describe("ConfigService", () => {
  describe("with feeds.json", () => {
    let module: TestingModule;
    let service: ConfigService;

    beforeAll(async () => {
      module = await Test.createTestingModule({ imports: [ConfigModule] }).compile();
      service = module.get(ConfigService);
    });

    afterAll(async () => {
      await module.close();
    });

    it("should load every feed definition", () => {
      const feeds = service.getFeedDefinitions();
      expect(feeds).toHaveLength(7);
      expect(feeds[0].feed).toEqual({ category: FeedCategory.Crypto, name: "BTC/USD" });
    });

    it("should merge per-feed parameters over the environment defaults", () => {
      const byName = (name: string) => service.getFeedDefinitions().find(definition => definition.feed.name === name);
      const btc = byName("BTC/USD");
      expect(btc?.parameters).toEqual({
        minQuorum: 5,
        roundDurationMs: 90000,
        toleranceMultiplier: 3,
        madFloor: 0.000001,
        minAgreement: 3,
        maxClockSkewMs: 5000,
      });

      const gold = byName("XAU/USD");
      expect(gold?.parameters.roundDurationMs).toBe(180000);
      expect(gold?.parameters.minQuorum).toBe(3);
    });

    it("should report a valid configuration", () => {
      const result = service.validateConfiguration();
      expect(result.isValid).toBe(true);
      expect(result.errors).toEqual([]);
    });

    it("should provide the system clock", () => {
      expect(module.get(CLOCK)).toBeInstanceOf(SystemClock);
    });
  });

  describe("with overrides", () => {
    it("should take feeds and policies from the override provider", async () => {
      const module = await Test.createTestingModule({
        providers: [
          ConfigService,
          {
            provide: ENGINE_SETTINGS_OVERRIDES,
            useValue: {
              feeds: [TestDataBuilder.createFeedDefinition()],
              slashing: { windowRounds: 4 },
            },
          },
        ],
      }).compile();
      const service = module.get(ConfigService);

      expect(service.getFeedDefinitions()).toHaveLength(1);
      expect(service.getSlashingPolicy().windowRounds).toBe(4);
      expect(service.getSlashingPolicy().repeatOffenseThreshold).toBe(3);
      await module.close();
    });

    it("should reject duplicate feeds", () => {
      const definition = TestDataBuilder.createFeedDefinition();
      expect(() => new ConfigService({ feeds: [definition, definition] })).toThrow(ConfigurationError);
    });

    it("should reject invalid feed parameters", () => {
      const definition = TestDataBuilder.createFeedDefinition({ minQuorum: 0 });
      expect(() => new ConfigService({ feeds: [definition] })).toThrow(
        "Feed 1:TEST/USD: minQuorum must be an integer of at least 1, got 0"
      );
    });

    it("should reject an out of range slash fraction", () => {
      expect(() => new ConfigService({ feeds: [], slashing: { slashFractionBps: 10001 } })).toThrow(
        "Invalid slash fraction: 10001 bps"
      );
    });

    it("should warn when reporters can never be slashed", () => {
      const service = new ConfigService({ feeds: [], slashing: { windowRounds: 3, repeatOffenseThreshold: 3 } });
      expect(service.validateConfiguration().warnings).toContain(
        "Repeat offense threshold is not below the window size, reporters can never be slashed"
      );
    });

    it("should merge partial default overrides over the environment defaults", () => {
      const service = new ConfigService({ feeds: [], defaults: { minQuorum: 2 } });
      expect(service.getEngineSettings().defaults).toEqual({
        minQuorum: 2,
        roundDurationMs: 90000,
        toleranceMultiplier: 3,
        madFloor: 0.000001,
        minAgreement: 3,
        maxClockSkewMs: 5000,
      });
    });
  });

  describe("parseFeedDefinitions", () => {
    const defaults = { ...new ConfigService({ feeds: [] }).getEngineSettings().defaults };

    it("should reject a non-array document", () => {
      expect(ConfigService.parseFeedDefinitions({}, defaults).errors).toEqual(["Feed definitions must be a JSON array"]);
    });

    it("should report entries with bad ids or parameter types", () => {
      const { definitions, errors } = ConfigService.parseFeedDefinitions(
        [
          { feed: { category: 7, name: "X" } },
          { feed: { category: 1, name: "A/B" }, parameters: { minQuorum: "3" } },
          { feed: { category: 2, name: "C/D" } },
        ],
        defaults
      );

      expect(errors).toEqual(["Entry 0: missing or invalid feed id", "Entry 1: minQuorum must be a number"]);
      expect(definitions.map(definition => definition.feed.name)).toEqual(["A/B", "C/D"]);
    });
  });
});
