import { ethers } from "ethers";
import { MalformedSubmissionError } from "@/common/errors/consensus-engine.errors";
import { FeedCategory } from "@/common/types/core";
import { TestDataBuilder } from "@/__tests__/utils";
import {
  SUBMISSION_PAYLOAD_BYTES,
  SUBMISSION_WIRE_BYTES,
  SubmissionCodec,
} from "../submission-codec";
import { SubmissionSigner } from "../submission-signer";

describe("SubmissionCodec", () => {
  const wallet = TestDataBuilder.createWallet(1);

  it("should use a 65-byte payload and a 130-byte wire format", () => {
    expect(SUBMISSION_PAYLOAD_BYTES).toBe(65);
    expect(SUBMISSION_WIRE_BYTES).toBe(130);
  });

  it("should lay out the payload big-endian in field order", () => {
    const bytes = SubmissionCodec.encodePayload({
      reporter: wallet.address,
      feed: { category: FeedCategory.Crypto, name: "BTC/USD" },
      round: 258,
      value: 1.5,
      timestamp: 1_700_000_000,
    });

    expect(ethers.hexlify(bytes.subarray(0, 20))).toBe(wallet.address.toLowerCase());
    expect(ethers.hexlify(bytes.subarray(20, 41))).toBe("0x014254432f55534400000000000000000000000000");
    expect(ethers.hexlify(bytes.subarray(41, 49))).toBe("0x0000000000000102");
    expect(ethers.hexlify(bytes.subarray(49, 57))).toBe("0x3ff8000000000000");
    expect(ethers.hexlify(bytes.subarray(57, 65))).toBe("0x000000006553f100");
  });

  it("should decode what it encodes", () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet, { round: 7, value: -0.125 });
    const decoded = SubmissionCodec.fromHex(SubmissionCodec.toHex(submission));

    expect(decoded).toEqual(submission);
  });

  it("should accept hex without the 0x prefix", () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet);
    const hex = SubmissionCodec.toHex(submission).slice(2);

    expect(SubmissionCodec.fromHex(hex).signature).toBe(submission.signature);
  });

  it("should reject input of the wrong length", () => {
    expect(() => SubmissionCodec.decode(new Uint8Array(129))).toThrow("Submission must be 130 bytes, got 129");
    expect(() => SubmissionCodec.fromHex("0x1234")).toThrow(MalformedSubmissionError);
  });

  it("should reject non-finite values and an unknown category byte", () => {
    const bytes = SubmissionCodec.encode(TestDataBuilder.createSignedSubmission(wallet));

    const nan = new Uint8Array(bytes);
    new DataView(nan.buffer).setFloat64(49, Number.NaN);
    expect(() => SubmissionCodec.decode(nan)).toThrow("value is not a finite number");

    const badCategory = new Uint8Array(bytes);
    badCategory[20] = 9;
    expect(() => SubmissionCodec.decode(badCategory)).toThrow("Unknown feed category byte: 9");
  });

  it("should refuse to encode payloads that do not fit the layout", () => {
    const payload = { reporter: wallet.address, feed: TestDataBuilder.createCoreFeedId(), round: 1, value: 1, timestamp: 1 };

    expect(() => SubmissionCodec.encodePayload({ ...payload, round: -1 })).toThrow(MalformedSubmissionError);
    expect(() => SubmissionCodec.encodePayload({ ...payload, value: Infinity })).toThrow(MalformedSubmissionError);
    expect(() => SubmissionCodec.encodePayload({ ...payload, reporter: "0xabc" })).toThrow("Invalid reporter address: 0xabc");
    expect(() =>
      SubmissionCodec.encodePayload({ ...payload, feed: { category: FeedCategory.Crypto, name: "A".repeat(21) } })
    ).toThrow(MalformedSubmissionError);
  });
});

describe("SubmissionSigner", () => {
  const wallet = TestDataBuilder.createWallet(1);
  const other = TestDataBuilder.createWallet(2);

  it("should recover the signing address", () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet);
    expect(SubmissionSigner.recover(submission)).toBe(wallet.address);
  });

  it("should produce the same signature asynchronously", async () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet);
    const { signature, ...payload } = submission;

    const signed = await SubmissionSigner.sign(wallet, payload);

    expect(signed.signature).toBe(signature);
  });

  it("should not recover the reporter when any signed field changes", () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet, { value: 100 });

    for (const tampered of [
      { ...submission, value: 100.01 },
      { ...submission, round: 2 },
      { ...submission, timestamp: submission.timestamp + 1 },
      { ...submission, feed: { ...submission.feed, name: "TEST/EUR" } },
      { ...submission, reporter: other.address },
    ]) {
      expect(SubmissionSigner.recover(tampered)).not.toBe(wallet.address);
    }
  });

  it("should return null for a signature that does not parse", () => {
    const submission = TestDataBuilder.createSignedSubmission(wallet);
    expect(SubmissionSigner.recover({ ...submission, signature: "0x1234" })).toBeNull();
  });
});
