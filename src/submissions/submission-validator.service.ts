import { Injectable } from "@nestjs/common";
import { ethers } from "ethers";
import { BaseService } from "@/common/base/base.service";
import {
  RejectionReason,
  ReporterStatus,
  isValidCoreFeedId,
  type CollectingRound,
  type Submission,
  type ValidationResult,
} from "@/common/types/core";
import { SIGNATURE_BYTES } from "./submission-codec";
import { SubmissionSigner } from "./submission-signer";

/**
 * What the validator may look at: the open round (its snapshot, window and who already submitted)
 * and the stake minimum. Never the values other reporters sent.
 */
export interface SubmissionValidationContext {
  round: Pick<CollectingRound, "sequence" | "startTime" | "deadline" | "snapshot" | "reporters"> & {
    parameters: Pick<CollectingRound["parameters"], "maxClockSkewMs">;
  };
  minimumStake: number;
}

function reject(reason: RejectionReason, message: string): ValidationResult {
  return { accepted: false, reason, message };
}

const ACCEPTED: ValidationResult = { accepted: true };

@Injectable()
export class SubmissionValidatorService extends BaseService {
  /**
   * Shape checks that do not need a round: address, numeric ranges and signature encoding
   */
  checkWellFormed(submission: Submission): ValidationResult {
    if (!ethers.isAddress(submission.reporter)) {
      return reject(RejectionReason.Malformed, `Invalid reporter address: ${submission.reporter}`);
    }
    if (!isValidCoreFeedId(submission.feed)) {
      return reject(RejectionReason.Malformed, "Invalid feed id");
    }
    if (!Number.isSafeInteger(submission.round) || submission.round < 1) {
      return reject(RejectionReason.Malformed, `Invalid round: ${submission.round}`);
    }
    if (!Number.isSafeInteger(submission.timestamp) || submission.timestamp < 0) {
      return reject(RejectionReason.Malformed, `Invalid timestamp: ${submission.timestamp}`);
    }
    if (!Number.isFinite(submission.value)) {
      return reject(RejectionReason.Malformed, `Value must be finite, got ${submission.value}`);
    }
    if (!ethers.isHexString(submission.signature, SIGNATURE_BYTES)) {
      return reject(RejectionReason.Malformed, `Signature must be ${SIGNATURE_BYTES} bytes of hex`);
    }
    return ACCEPTED;
  }

  /**
   * Runs the admission checks in order: reporter standing, signature, round, duplicate, time window.
   * Pure; the caller appends the submission when it is accepted.
   */
  validate(submission: Submission, context: SubmissionValidationContext): ValidationResult {
    const { round, minimumStake } = context;
    const reporterId = ethers.getAddress(submission.reporter);

    const reporter = round.snapshot.get(reporterId);
    if (!reporter) {
      return reject(RejectionReason.UnknownReporter, `Reporter ${reporterId} is not registered`);
    }
    if (reporter.status !== ReporterStatus.Active) {
      return reject(RejectionReason.ReporterInactive, `Reporter ${reporterId} is ${reporter.status}`);
    }
    if (reporter.stake < minimumStake) {
      return reject(
        RejectionReason.InsufficientStake,
        `Reporter ${reporterId} stake ${reporter.stake} is below ${minimumStake}`
      );
    }

    const signer = SubmissionSigner.recover(submission);
    if (signer !== reporterId) {
      return reject(RejectionReason.BadSignature, `Signature does not recover reporter ${reporterId}`);
    }

    if (submission.round !== round.sequence) {
      return reject(
        RejectionReason.WrongRound,
        `Submission is for round ${submission.round}, open round is ${round.sequence}`
      );
    }

    if (round.reporters.has(reporterId)) {
      return reject(RejectionReason.Duplicate, `Reporter ${reporterId} already submitted in round ${round.sequence}`);
    }

    // Timestamps carry whole seconds, so the window widens to the seconds it touches.
    const skew = round.parameters.maxClockSkewMs;
    const earliest = Math.floor((round.startTime - skew) / 1000);
    const latest = Math.ceil((round.deadline + skew) / 1000);
    if (submission.timestamp < earliest || submission.timestamp > latest) {
      return reject(
        RejectionReason.Stale,
        `Timestamp ${submission.timestamp} is outside the round window [${earliest}, ${latest}] s`
      );
    }

    return ACCEPTED;
  }
}
