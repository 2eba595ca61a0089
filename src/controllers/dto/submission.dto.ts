import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsEthereumAddress, IsInt, IsNumber, IsString, Matches, Min, ValidateNested } from "class-validator";
import { RejectionReason } from "@/common/types/core";
import { FeedIdDto } from "./feed.dto";

export class SubmissionDto {
  @ApiProperty({
    description: "Reporter address, 20 bytes",
    example: "0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf",
  })
  @IsEthereumAddress()
  reporter!: string;

  @ApiProperty({ type: FeedIdDto })
  @ValidateNested()
  @Type(() => FeedIdDto)
  feed!: FeedIdDto;

  @ApiProperty({ description: "Round sequence the value is for", example: 12 })
  @IsInt()
  @Min(1)
  round!: number;

  @ApiProperty({ description: "Observed value", example: 64250.5 })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  value!: number;

  @ApiProperty({ description: "Observation time, unix seconds", example: 1703123456 })
  @IsInt()
  @Min(0)
  timestamp!: number;

  @ApiProperty({
    description: "65-byte signature over the 65-byte payload, 0x-prefixed hex",
    example: `0x${"ab".repeat(65)}`,
  })
  @IsString()
  @Matches(/^0x[0-9a-fA-F]{130}$/, { message: "signature must be 65 bytes of 0x-prefixed hex" })
  signature!: string;
}

export class RawSubmissionDto {
  @ApiProperty({
    description: "130-byte wire encoding of a signed submission, hex with optional 0x prefix",
    example: `0x${"00".repeat(130)}`,
  })
  @IsString()
  @Matches(/^(0x)?[0-9a-fA-F]{260}$/, { message: "data must be 130 bytes of hex" })
  data!: string;
}

export class SubmissionReceiptDto {
  @ApiProperty({ example: true })
  accepted!: boolean;

  @ApiPropertyOptional({ enum: RejectionReason, example: RejectionReason.Duplicate })
  reason?: RejectionReason;

  @ApiPropertyOptional({ example: "Reporter already submitted for round 12" })
  message?: string;

  @ApiPropertyOptional({ example: "0x014254432f55534400000000000000000000000000" })
  feedKey?: string;

  @ApiPropertyOptional({ example: 12 })
  round?: number;

  @ApiPropertyOptional({ description: "Accepted submissions in the round after this one", example: 3 })
  submissionCount?: number;
}
