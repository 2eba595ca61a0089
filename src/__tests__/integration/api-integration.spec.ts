import type { INestApplication } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import request from "supertest";
import { AppModule } from "@/app.module";
import { ErrorCode } from "@/common/types/error-handling";
import { FeedCategory, RejectionReason, ReporterStatus, type Submission, type SubmissionReceipt } from "@/common/types/core";
import { CLOCK } from "@/common/utils/clock";
import { ENGINE_SETTINGS_OVERRIDES, type EngineSettingsOverrides } from "@/config/config.service";
import { SubmissionCodec } from "@/submissions/submission-codec";
import { ManualClock, TestDataBuilder } from "@/__tests__/utils";

describe("API Integration", () => {
  const start = 1_700_000_000_000;
  const btc = { category: FeedCategory.Crypto, name: "BTC/USD" };
  const wallets = TestDataBuilder.createWallets(3);
  const overrides: EngineSettingsOverrides = {
    feeds: [TestDataBuilder.createFeedDefinition({}, btc)],
    scheduleDeadlines: false,
  };

  let app: INestApplication;
  let clock: ManualClock;

  const roundTwo = (index: number, value: number): Submission =>
    TestDataBuilder.createSignedSubmission(wallets[index], {
      feed: btc,
      round: 2,
      value,
      timestamp: (start + 60_000) / 1000,
    });

  beforeAll(async () => {
    clock = new ManualClock(start);
    const module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(ENGINE_SETTINGS_OVERRIDES)
      .useValue(overrides)
      .compile();

    app = module.createNestApplication();
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it("should register reporters", async () => {
    for (const wallet of wallets) {
      const response = await request(app.getHttpServer())
        .post("/reporters")
        .send({ id: wallet.address, stake: 1000 })
        .expect(201);

      expect(response.body).toMatchObject({
        success: true,
        data: { id: wallet.address, stake: 1000, reputation: 50, status: ReporterStatus.Active, recentFlags: 0 },
      });
    }
  });

  it("should refuse a malformed registration", async () => {
    const response = await request(app.getHttpServer())
      .post("/reporters")
      .send({ id: "not-an-address", stake: 1000 })
      .expect(400);

    expect(response.body).toMatchObject({
      success: false,
      statusCode: 400,
      path: "/reporters",
      method: "POST",
      error: { code: ErrorCode.VALIDATION_ERROR },
    });
  });

  it("should answer 404 for an unknown reporter", async () => {
    const stranger = TestDataBuilder.createWallet(9).address;
    const response = await request(app.getHttpServer()).get(`/reporters/${stranger}`).expect(404);

    expect(response.body.error.code).toBe(ErrorCode.REPORTER_NOT_FOUND);
  });

  it("should close round 1 at its deadline and publish round 2 at quorum", async () => {
    // round 1 opened before anyone registered, so it runs out empty
    clock.set(start + 60_000);

    const receipts: SubmissionReceipt[] = [];
    for (const [index, value] of [64_000, 64_010, 63_990].entries()) {
      const response = await request(app.getHttpServer()).post("/submissions").send(roundTwo(index, value)).expect(200);
      receipts.push(response.body.data);
    }

    expect(receipts.map(receipt => [receipt.accepted, receipt.round, receipt.submissionCount])).toEqual([
      [true, 2, 1],
      [true, 2, 2],
      [true, 2, 3],
    ]);

    const values = await request(app.getHttpServer()).post("/feed-values").send({ feeds: [btc] }).expect(200);
    expect(values.body.data.pending).toEqual([]);
    expect(values.body.data.values).toEqual([
      expect.objectContaining({ feed: btc, value: 64_000, timestamp: 1_700_000_060, round: 2 }),
    ]);
  });

  it("should return a rejection receipt for a submission to a closed round", async () => {
    const data = SubmissionCodec.toHex(roundTwo(0, 64_000));
    const response = await request(app.getHttpServer()).post("/submissions/raw").send({ data }).expect(200);

    expect(response.body.data).toMatchObject({ accepted: false, reason: RejectionReason.WrongRound, round: 3 });
  });

  it("should refuse raw data of the wrong size", async () => {
    await request(app.getHttpServer()).post("/submissions/raw").send({ data: "0x1234" }).expect(400);
  });

  it("should serve feed status and round audits", async () => {
    const status = await request(app.getHttpServer()).get("/feeds/1/BTC%2FUSD").expect(200);
    expect(status.body.data).toMatchObject({ halted: false, lastOutcome: "published", round: { sequence: 3 } });

    const audit = await request(app.getHttpServer()).get("/feeds/1/BTC%2FUSD/rounds/1").expect(200);
    expect(audit.body.data).toMatchObject({ outcome: "insufficient-quorum", closeReason: "deadline", submissions: [] });

    const missing = await request(app.getHttpServer()).get("/feeds/1/BTC%2FUSD/rounds/99").expect(404);
    expect(missing.body.error.code).toBe(ErrorCode.ROUND_NOT_FOUND);
  });

  it("should report health and metrics", async () => {
    const health = await request(app.getHttpServer()).get("/health").expect(200);
    expect(health.body).toMatchObject({ status: "healthy", reporters: 3, haltedFeeds: [] });

    const metrics = await request(app.getHttpServer()).get("/metrics").expect(200);
    expect(metrics.body.feeds[0].counters).toMatchObject({
      accepted: 3,
      outcomes: { published: 1, "insufficient-quorum": 1, "insufficient-agreement": 0 },
    });
    expect(metrics.body.feeds[0].counters.rejected[RejectionReason.WrongRound]).toBe(1);
  });

  it("should halt and resume a feed through the API", async () => {
    await request(app.getHttpServer()).post("/feeds/1/BTC%2FUSD/halt").send({ reason: "maintenance" }).expect(200);

    const health = await request(app.getHttpServer()).get("/health").expect(200);
    expect(health.body.status).toBe("degraded");

    const resumed = await request(app.getHttpServer()).post("/feeds/1/BTC%2FUSD/resume").expect(200);
    expect(resumed.body.data.round.sequence).toBe(4);

    await request(app.getHttpServer()).post("/feeds/1/BTC%2FUSD/resume").expect(409);
  });
});
