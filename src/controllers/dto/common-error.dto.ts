import { ApiProperty } from "@nestjs/swagger";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";

export class ErrorDetailsDto {
  @ApiProperty({
    description: "Error code",
    enum: ErrorCode,
    example: ErrorCode.FEED_NOT_FOUND,
  })
  code!: ErrorCode;

  @ApiProperty({
    description: "Human-readable error message",
    example: "Feed 0x014254432f55534400000000000000000000000000 is not registered",
  })
  message!: string;

  @ApiProperty({
    description: "Error severity level",
    enum: ErrorSeverity,
    example: ErrorSeverity.LOW,
  })
  severity!: ErrorSeverity;

  @ApiProperty({
    description: "Error class or component the error came from",
    example: "UnknownFeedError",
    required: false,
  })
  module?: string;

  @ApiProperty({ description: "Error timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({
    description: "Additional error context",
    additionalProperties: true,
    required: false,
  })
  context?: Record<string, unknown>;
}

export class HttpErrorResponseDto {
  @ApiProperty({
    description: "Success status (always false for errors)",
    example: false,
  })
  success!: false;

  @ApiProperty({ type: ErrorDetailsDto })
  error!: ErrorDetailsDto;

  @ApiProperty({ description: "Response timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({
    description: "Request ID for tracing",
    example: "3f0c2a8e-8d3b-4f55-9d6f-4a1b2c3d4e5f",
    required: false,
  })
  requestId?: string;

  @ApiProperty({ description: "HTTP status code", example: 404 })
  statusCode!: number;

  @ApiProperty({ description: "Request path", example: "/feeds/1/BTC%2FUSD" })
  path!: string;

  @ApiProperty({ description: "Request method", example: "GET" })
  method!: string;
}
