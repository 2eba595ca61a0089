import { ApiProperty } from "@nestjs/swagger";
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsString,
  Length,
  MinLength,
  ValidateNested,
} from "class-validator";
import { Type } from "class-transformer";
import { FeedCategory } from "@/common/types/core";

export const FEED_CATEGORY_VALUES = Object.values(FeedCategory).filter(value => typeof value === "number");

export class FeedIdDto {
  @ApiProperty({
    description: "Feed category (1=Crypto, 2=Forex, 3=Commodity, 4=Stock)",
    enum: FeedCategory,
    example: 1,
  })
  @IsIn(FEED_CATEGORY_VALUES)
  category!: FeedCategory;

  @ApiProperty({
    description: "Feed name, at most 20 bytes",
    example: "BTC/USD",
    minLength: 1,
    maxLength: 20,
  })
  @IsString()
  @Length(1, 20)
  name!: string;
}

export class FeedValuesRequestDto {
  @ApiProperty({
    description: "Feeds to read the published value of",
    type: [FeedIdDto],
    example: [
      { category: 1, name: "BTC/USD" },
      { category: 1, name: "ETH/USD" },
    ],
  })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => FeedIdDto)
  feeds!: FeedIdDto[];
}

export class PublishedFeedRecordDto {
  @ApiProperty({ type: FeedIdDto })
  feed!: FeedIdDto;

  @ApiProperty({ description: "Hex of the 21-byte encoded feed id", example: "0x014254432f55534400000000000000000000000000" })
  feedKey!: string;

  @ApiProperty({ description: "Stake-weighted consensus value", example: 100.0 })
  value!: number;

  @ApiProperty({ description: "Weighted standard deviation of the agreeing submissions", example: 0.8165 })
  confidenceInterval!: number;

  @ApiProperty({ description: "Round close time, unix seconds", example: 1703123456 })
  timestamp!: number;

  @ApiProperty({ description: "Round sequence the value was published in", example: 42 })
  round!: number;
}

export class FeedValuesResponseDto {
  @ApiProperty({ type: [PublishedFeedRecordDto] })
  values!: PublishedFeedRecordDto[];

  @ApiProperty({ description: "Requested feeds that have not published a value yet", type: [FeedIdDto] })
  pending!: FeedIdDto[];
}

export class HaltFeedDto {
  @ApiProperty({ description: "Why the feed is being stopped", example: "source outage" })
  @IsString()
  @MinLength(1)
  reason!: string;
}
