/**
 * Feed Id Utilities
 * Fixed-width encoding of feed ids: one category byte followed by the name, zero-padded to 20 bytes
 */

import { ethers } from "ethers";
import { FeedCategory, isValidFeedCategory, type CoreFeedId } from "@/common/types/core";
import { MalformedSubmissionError } from "@/common/errors/consensus-engine.errors";

export const FEED_NAME_BYTES = 20;
export const FEED_ID_BYTES = FEED_NAME_BYTES + 1;

export class FeedIdEncoder {
  static encode(feed: CoreFeedId): Uint8Array {
    if (!isValidFeedCategory(feed.category)) {
      throw new MalformedSubmissionError(`Unknown feed category: ${feed.category}`, { feed });
    }

    const name = ethers.toUtf8Bytes(feed.name);
    if (name.length === 0 || name.length > FEED_NAME_BYTES) {
      throw new MalformedSubmissionError(`Feed name must be 1 to ${FEED_NAME_BYTES} bytes: "${feed.name}"`, { feed });
    }
    if (name.includes(0)) {
      throw new MalformedSubmissionError("Feed name cannot contain NUL bytes", { feed });
    }

    const bytes = new Uint8Array(FEED_ID_BYTES);
    bytes[0] = feed.category;
    bytes.set(name, 1);
    return bytes;
  }

  static decode(bytes: Uint8Array): CoreFeedId {
    if (bytes.length !== FEED_ID_BYTES) {
      throw new MalformedSubmissionError(`Feed id must be ${FEED_ID_BYTES} bytes, got ${bytes.length}`);
    }

    const category = bytes[0];
    if (!isValidFeedCategory(category)) {
      throw new MalformedSubmissionError(`Unknown feed category byte: ${category}`);
    }

    const nameBytes = bytes.subarray(1);
    const end = nameBytes.indexOf(0);
    const nameLength = end === -1 ? FEED_NAME_BYTES : end;
    if (nameLength === 0) {
      throw new MalformedSubmissionError("Feed name is empty");
    }
    if (nameBytes.subarray(nameLength).some(byte => byte !== 0)) {
      throw new MalformedSubmissionError("Feed name padding must be zero bytes");
    }

    try {
      return { category, name: ethers.toUtf8String(nameBytes.subarray(0, nameLength)) };
    } catch (error) {
      throw new MalformedSubmissionError("Feed name is not valid UTF-8", { cause: String(error) });
    }
  }

  /**
   * Map key for a feed: the 0x-prefixed hex of its encoded id
   */
  static toKey(feed: CoreFeedId): string {
    return ethers.hexlify(FeedIdEncoder.encode(feed));
  }

  static fromKey(key: string): CoreFeedId {
    if (!ethers.isHexString(key, FEED_ID_BYTES)) {
      throw new MalformedSubmissionError(`Feed key must be ${FEED_ID_BYTES} bytes of hex: ${key}`);
    }
    return FeedIdEncoder.decode(ethers.getBytes(key));
  }

  static describe(feed: CoreFeedId): string {
    return `${FeedCategory[feed.category] ?? feed.category}:${feed.name}`;
  }
}
