import { Body, Controller, Header, HttpCode, Post } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import type { SubmissionReceipt } from "@/common/types/core";
import type { ApiResponse as ApiEnvelope } from "@/common/types/http";
import { ConsensusRoundEngineService } from "@/rounds/consensus-round-engine.service";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import { RawSubmissionDto, SubmissionDto, SubmissionReceiptDto } from "./dto/submission.dto";

/**
 * Reporter intake. A rejected submission is still a 200: the receipt carries the reason.
 */
@ApiTags("Submissions")
@Controller("submissions")
export class SubmissionController extends BaseController {
  constructor(private readonly engine: ConsensusRoundEngineService) {
    super();
  }

  @Post()
  @HttpCode(200)
  @Header("Content-Type", "application/json")
  @ApiOperation({ summary: "Submit a signed value", description: "JSON form of the signed submission tuple" })
  @ApiResponse({ status: 200, description: "Submission receipt", type: SubmissionReceiptDto })
  @ApiResponse({ status: 400, description: "Request body is not a submission", type: HttpErrorResponseDto })
  async submit(@Body() body: SubmissionDto): Promise<ApiEnvelope<SubmissionReceipt>> {
    return this.executeOperation(
      () =>
        this.engine.submit({
          reporter: body.reporter,
          feed: { category: body.feed.category, name: body.feed.name },
          round: body.round,
          value: body.value,
          timestamp: body.timestamp,
          signature: body.signature,
        }),
      "submit",
      { performanceThreshold: 50 }
    );
  }

  @Post("raw")
  @HttpCode(200)
  @Header("Content-Type", "application/json")
  @ApiOperation({ summary: "Submit a wire-encoded value", description: "130-byte wire encoding as hex" })
  @ApiResponse({ status: 200, description: "Submission receipt", type: SubmissionReceiptDto })
  @ApiResponse({ status: 400, description: "Body is not 130 bytes of hex", type: HttpErrorResponseDto })
  async submitRaw(@Body() body: RawSubmissionDto): Promise<ApiEnvelope<SubmissionReceipt>> {
    return this.executeOperation(() => this.engine.submitRaw(body.data), "submitRaw", { performanceThreshold: 50 });
  }
}
