import { ethers } from "ethers";
import type { ReporterId, Submission, SubmissionPayload } from "@/common/types/core";
import { SIGNATURE_BYTES, SubmissionCodec } from "./submission-codec";

/**
 * EIP-191 personal-sign over the payload digest
 */
export class SubmissionSigner {
  static async sign(signer: ethers.Signer, payload: SubmissionPayload): Promise<Submission> {
    const normalized = SubmissionCodec.payloadOf(payload);
    const signature = await signer.signMessage(ethers.getBytes(SubmissionCodec.digest(normalized)));
    return { ...normalized, signature };
  }

  static signSync(wallet: ethers.BaseWallet, payload: SubmissionPayload): Submission {
    const normalized = SubmissionCodec.payloadOf(payload);
    const signature = wallet.signMessageSync(ethers.getBytes(SubmissionCodec.digest(normalized)));
    return { ...normalized, signature };
  }

  /**
   * Address that produced the signature over this exact payload, or null when the signature does not parse
   */
  static recover(submission: Submission): ReporterId | null {
    if (!ethers.isHexString(submission.signature, SIGNATURE_BYTES)) {
      return null;
    }
    try {
      return ethers.verifyMessage(ethers.getBytes(SubmissionCodec.digest(submission)), submission.signature);
    } catch {
      return null;
    }
  }
}
