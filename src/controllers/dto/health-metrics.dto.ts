import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { RoundOutcomeKind } from "@/common/types/core";
import { FeedIdDto } from "./feed.dto";

// Health DTOs
export class OpenRoundDto {
  @ApiProperty({ type: FeedIdDto })
  feed!: FeedIdDto;

  @ApiProperty({ example: 12 })
  sequence!: number;

  @ApiProperty({ description: "Round deadline, ms", example: 1703123546789 })
  deadline!: number;

  @ApiProperty({ example: 2 })
  submissionCount!: number;

  @ApiProperty({ example: 3 })
  minQuorum!: number;
}

export class HaltedFeedDto {
  @ApiProperty({ type: FeedIdDto })
  feed!: FeedIdDto;

  @ApiProperty({ example: "Round sequence for Crypto:BTC/USD did not advance" })
  reason!: string;
}

export class HealthCheckResponseDto {
  @ApiProperty({
    description: "Overall status. Degraded while any feed is halted.",
    enum: ["healthy", "degraded"],
    example: "healthy",
  })
  status!: "healthy" | "degraded";

  @ApiProperty({ description: "Health check timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "System uptime in seconds", example: 3600 })
  uptime!: number;

  @ApiProperty({ description: "Registered reporters", example: 12 })
  reporters!: number;

  @ApiProperty({ type: [OpenRoundDto] })
  openRounds!: OpenRoundDto[];

  @ApiProperty({ type: [HaltedFeedDto] })
  haltedFeeds!: HaltedFeedDto[];
}

// Metrics DTOs
export class FeedCountersDto {
  @ApiProperty({ example: 240 })
  accepted!: number;

  @ApiProperty({
    description: "Rejections by reason",
    additionalProperties: { type: "number" },
    example: { duplicate: 2, stale: 1 },
  })
  rejected!: Record<string, number>;

  @ApiProperty({
    description: "Finalized rounds by outcome",
    additionalProperties: { type: "number" },
    example: { [RoundOutcomeKind.Published]: 80, [RoundOutcomeKind.InsufficientQuorum]: 1 },
  })
  outcomes!: Record<string, number>;
}

export class FeedMetricsDto {
  @ApiProperty({ type: FeedIdDto })
  feed!: FeedIdDto;

  @ApiProperty({ example: "0x014254432f55534400000000000000000000000000" })
  feedKey!: string;

  @ApiProperty({ example: false })
  halted!: boolean;

  @ApiProperty({ type: FeedCountersDto })
  counters!: FeedCountersDto;
}

export class MetricsResponseDto {
  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ example: 3600 })
  uptime!: number;

  @ApiProperty({ type: [FeedMetricsDto] })
  feeds!: FeedMetricsDto[];

  @ApiPropertyOptional({
    description: "Rejections that could not be routed to a feed",
    additionalProperties: { type: "number" },
    example: { malformed: 3, "unknown-feed": 1 },
  })
  unroutedRejections!: Record<string, number>;
}
