import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
} from "@nestjs/common";
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import {
  isValidFeedCategory,
  type CoreFeedId,
  type PublishedFeedRecord,
  type RoundAuditRecord,
} from "@/common/types/core";
import type { ApiResponse as ApiEnvelope } from "@/common/types/http";
import { ConsensusRoundEngineService, type FeedStatus } from "@/rounds/consensus-round-engine.service";
import { FeedValuesRequestDto, FeedValuesResponseDto, HaltFeedDto, PublishedFeedRecordDto } from "./dto/feed.dto";
import { HttpErrorResponseDto } from "./dto/common-error.dto";

export interface FeedValuesResult {
  values: PublishedFeedRecord[];
  pending: CoreFeedId[];
}

/**
 * Feed names carry a slash, so clients send them URL-encoded (`BTC%2FUSD`)
 */
function toFeedId(category: number, name: string): CoreFeedId {
  if (!isValidFeedCategory(category)) {
    throw new BadRequestException(`Unknown feed category: ${category}`);
  }
  return { category, name };
}

@ApiTags("Feeds")
@Controller()
export class FeedController extends BaseController {
  constructor(private readonly engine: ConsensusRoundEngineService) {
    super();
  }

  @Post("feed-values")
  @HttpCode(200)
  @Header("Content-Type", "application/json")
  @ApiOperation({
    summary: "Get published feed values",
    description: "Returns the last published value of each requested feed. Feeds without one are listed as pending.",
  })
  @ApiResponse({ status: 200, description: "Published values retrieved", type: FeedValuesResponseDto })
  @ApiResponse({ status: 400, description: "Invalid feed request", type: HttpErrorResponseDto })
  @ApiResponse({ status: 404, description: "A requested feed is not registered", type: HttpErrorResponseDto })
  async getFeedValues(@Body() body: FeedValuesRequestDto): Promise<ApiEnvelope<FeedValuesResult>> {
    return this.executeOperation(
      () => {
        const values: PublishedFeedRecord[] = [];
        const pending: CoreFeedId[] = [];
        for (const feed of body.feeds) {
          const record = this.engine.getPublished(feed);
          if (record) {
            values.push(record);
          } else {
            pending.push({ category: feed.category, name: feed.name });
          }
        }
        return { values, pending };
      },
      "getFeedValues",
      { performanceThreshold: 100 }
    );
  }

  @Get("feeds")
  @ApiOperation({ summary: "List feeds", description: "Status of every registered feed and its open round" })
  @ApiResponse({ status: 200, description: "Feed statuses retrieved" })
  async listFeeds(): Promise<ApiEnvelope<FeedStatus[]>> {
    return this.executeOperation(() => this.engine.listFeedStatuses(), "listFeeds");
  }

  @Get("feeds/:category/:name")
  @ApiOperation({ summary: "Get feed status", description: "Open round, halt state and last published record" })
  @ApiParam({ name: "category", example: 1 })
  @ApiParam({ name: "name", example: "BTC%2FUSD" })
  @ApiResponse({ status: 200, description: "Feed status retrieved", type: PublishedFeedRecordDto })
  @ApiResponse({ status: 404, description: "Feed not registered", type: HttpErrorResponseDto })
  async getFeed(
    @Param("category", ParseIntPipe) category: number,
    @Param("name") name: string
  ): Promise<ApiEnvelope<FeedStatus>> {
    return this.executeOperation(() => this.engine.getFeedStatus(toFeedId(category, name)), "getFeed");
  }

  @Get("feeds/:category/:name/rounds/:sequence")
  @ApiOperation({
    summary: "Get round audit record",
    description: "Every accepted submission of a finalized round with its weight, deviation and outlier flag",
  })
  @ApiResponse({ status: 200, description: "Audit record retrieved" })
  @ApiResponse({ status: 404, description: "Feed or round not found", type: HttpErrorResponseDto })
  async getRoundAudit(
    @Param("category", ParseIntPipe) category: number,
    @Param("name") name: string,
    @Param("sequence", ParseIntPipe) sequence: number
  ): Promise<ApiEnvelope<RoundAuditRecord>> {
    return this.executeOperation(
      () => this.engine.getRoundAudit(toFeedId(category, name), sequence),
      "getRoundAudit"
    );
  }

  @Post("feeds/:category/:name/halt")
  @HttpCode(200)
  @ApiOperation({ summary: "Halt a feed", description: "Abandons the open round and rejects submissions until resumed" })
  @ApiResponse({ status: 200, description: "Feed halted" })
  @ApiResponse({ status: 404, description: "Feed not registered", type: HttpErrorResponseDto })
  async haltFeed(
    @Param("category", ParseIntPipe) category: number,
    @Param("name") name: string,
    @Body() body: HaltFeedDto
  ): Promise<ApiEnvelope<FeedStatus>> {
    return this.executeOperation(() => this.engine.haltFeed(toFeedId(category, name), body.reason), "haltFeed");
  }

  @Post("feeds/:category/:name/resume")
  @HttpCode(200)
  @ApiOperation({ summary: "Resume a halted feed", description: "Opens a fresh round after the abandoned one" })
  @ApiResponse({ status: 200, description: "Feed resumed" })
  @ApiResponse({ status: 409, description: "Feed is not halted", type: HttpErrorResponseDto })
  async resumeFeed(
    @Param("category", ParseIntPipe) category: number,
    @Param("name") name: string
  ): Promise<ApiEnvelope<FeedStatus>> {
    return this.executeOperation(() => this.engine.resumeFeed(toFeedId(category, name)), "resumeFeed");
  }
}
