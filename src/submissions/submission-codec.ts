/**
 * Submission wire codec
 *
 * Layout (big-endian, 130 bytes):
 *   reporter   20
 *   feed id    21  (category byte + name zero-padded to 20 bytes)
 *   round       8  uint64
 *   value       8  float64
 *   timestamp   8  uint64, unix seconds
 *   signature  65
 *
 * The first 65 bytes are the signed payload.
 */

import { ethers } from "ethers";
import type { Submission, SubmissionPayload } from "@/common/types/core";
import { MalformedSubmissionError } from "@/common/errors/consensus-engine.errors";
import { FEED_ID_BYTES, FeedIdEncoder } from "@/common/utils/feed-id.utils";

export const REPORTER_BYTES = 20;
export const SIGNATURE_BYTES = 65;
export const SUBMISSION_PAYLOAD_BYTES = REPORTER_BYTES + FEED_ID_BYTES + 8 + 8 + 8;
export const SUBMISSION_WIRE_BYTES = SUBMISSION_PAYLOAD_BYTES + SIGNATURE_BYTES;

const ROUND_OFFSET = REPORTER_BYTES + FEED_ID_BYTES;
const VALUE_OFFSET = ROUND_OFFSET + 8;
const TIMESTAMP_OFFSET = VALUE_OFFSET + 8;

function assertUint(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new MalformedSubmissionError(`${field} must be a non-negative safe integer, got ${value}`, { field });
  }
}

function readUint(view: DataView, offset: number, field: string): number {
  const value = view.getBigUint64(offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedSubmissionError(`${field} exceeds the safe integer range`, { field });
  }
  return Number(value);
}

function normalizeAddress(address: string): string {
  try {
    return ethers.getAddress(address);
  } catch {
    throw new MalformedSubmissionError(`Invalid reporter address: ${address}`);
  }
}

export class SubmissionCodec {
  static encodePayload(payload: SubmissionPayload): Uint8Array {
    assertUint("round", payload.round);
    assertUint("timestamp", payload.timestamp);
    if (!Number.isFinite(payload.value)) {
      throw new MalformedSubmissionError(`value must be finite, got ${payload.value}`);
    }

    const bytes = new Uint8Array(SUBMISSION_PAYLOAD_BYTES);
    const view = new DataView(bytes.buffer);
    bytes.set(ethers.getBytes(normalizeAddress(payload.reporter)), 0);
    bytes.set(FeedIdEncoder.encode(payload.feed), REPORTER_BYTES);
    view.setBigUint64(ROUND_OFFSET, BigInt(payload.round));
    view.setFloat64(VALUE_OFFSET, payload.value);
    view.setBigUint64(TIMESTAMP_OFFSET, BigInt(payload.timestamp));
    return bytes;
  }

  static encode(submission: Submission): Uint8Array {
    if (!ethers.isHexString(submission.signature, SIGNATURE_BYTES)) {
      throw new MalformedSubmissionError(`Signature must be ${SIGNATURE_BYTES} bytes of hex`);
    }

    const bytes = new Uint8Array(SUBMISSION_WIRE_BYTES);
    bytes.set(SubmissionCodec.encodePayload(submission), 0);
    bytes.set(ethers.getBytes(submission.signature), SUBMISSION_PAYLOAD_BYTES);
    return bytes;
  }

  static decode(bytes: Uint8Array): Submission {
    if (bytes.length !== SUBMISSION_WIRE_BYTES) {
      throw new MalformedSubmissionError(`Submission must be ${SUBMISSION_WIRE_BYTES} bytes, got ${bytes.length}`, {
        length: bytes.length,
      });
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const value = view.getFloat64(VALUE_OFFSET);
    if (!Number.isFinite(value)) {
      throw new MalformedSubmissionError("value is not a finite number");
    }

    return {
      reporter: ethers.getAddress(ethers.hexlify(bytes.subarray(0, REPORTER_BYTES))),
      feed: FeedIdEncoder.decode(bytes.subarray(REPORTER_BYTES, ROUND_OFFSET)),
      round: readUint(view, ROUND_OFFSET, "round"),
      value,
      timestamp: readUint(view, TIMESTAMP_OFFSET, "timestamp"),
      signature: ethers.hexlify(bytes.subarray(SUBMISSION_PAYLOAD_BYTES)),
    };
  }

  static toHex(submission: Submission): string {
    return ethers.hexlify(SubmissionCodec.encode(submission));
  }

  static fromHex(hex: string): Submission {
    const prefixed = hex.startsWith("0x") ? hex : `0x${hex}`;
    if (!ethers.isHexString(prefixed, SUBMISSION_WIRE_BYTES)) {
      throw new MalformedSubmissionError(`Expected ${SUBMISSION_WIRE_BYTES} bytes of hex`);
    }
    return SubmissionCodec.decode(ethers.getBytes(prefixed));
  }

  /**
   * keccak256 of the encoded payload. This is the message reporters sign.
   */
  static digest(payload: SubmissionPayload): string {
    return ethers.keccak256(SubmissionCodec.encodePayload(payload));
  }

  /**
   * Copy of the payload fields only, with the reporter address checksummed
   */
  static payloadOf(submission: SubmissionPayload): SubmissionPayload {
    return {
      reporter: normalizeAddress(submission.reporter),
      feed: { category: submission.feed.category, name: submission.feed.name },
      round: submission.round,
      value: submission.value,
      timestamp: submission.timestamp,
    };
  }
}
