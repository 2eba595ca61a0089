import type { TestingModule } from "@nestjs/testing";
import { FeedCategory } from "@/common/types/core";
import { RegistryModule } from "@/registry/registry.module";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { ConsensusRoundEngineService } from "@/rounds/consensus-round-engine.service";
import { ManualClock, TestDataBuilder, createTestModule } from "@/__tests__/utils";
import { HealthController } from "../health.controller";

describe("HealthController", () => {
  const btc = { category: FeedCategory.Crypto, name: "BTC/USD" };
  const gold = { category: FeedCategory.Commodity, name: "XAU/USD" };

  let module: TestingModule;
  let controller: HealthController;
  let engine: ConsensusRoundEngineService;

  beforeEach(async () => {
    ({ module } = await createTestModule()
      .withClock(new ManualClock(1_700_000_000_000))
      .withSettings({
        feeds: [TestDataBuilder.createFeedDefinition({}, btc), TestDataBuilder.createFeedDefinition({ minQuorum: 5 }, gold)],
      })
      .addImport(RegistryModule)
      .addController(HealthController)
      .build());
    controller = module.get(HealthController);
    engine = module.get(ConsensusRoundEngineService);

    const registry = module.get(ReporterRegistryService);
    for (const wallet of TestDataBuilder.createWallets(2)) registry.register(wallet.address, 1000);
  });

  afterEach(async () => {
    await module.close();
  });

  it("should report healthy with every open round", () => {
    const health = controller.getHealth();

    expect(health.status).toBe("healthy");
    expect(health.reporters).toBe(2);
    expect(health.haltedFeeds).toEqual([]);
    expect(health.openRounds).toEqual([
      { feed: btc, sequence: 1, deadline: 1_700_000_060_000, submissionCount: 0, minQuorum: 3 },
      { feed: gold, sequence: 1, deadline: 1_700_000_060_000, submissionCount: 0, minQuorum: 5 },
    ]);
  });

  it("should report degraded while a feed is halted", () => {
    engine.haltFeed(gold, "source dispute");

    const health = controller.getHealth();

    expect(health.status).toBe("degraded");
    expect(health.haltedFeeds).toEqual([{ feed: gold, reason: "source dispute" }]);
    expect(health.openRounds.map(round => round.feed)).toEqual([btc]);
  });
});
