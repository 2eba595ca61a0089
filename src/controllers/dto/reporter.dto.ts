import { ApiProperty } from "@nestjs/swagger";
import { IsEthereumAddress, IsInt, IsPositive } from "class-validator";
import { ReporterStatus } from "@/common/types/core";

export class RegisterReporterDto {
  @ApiProperty({
    description: "Reporter address, 20 bytes",
    example: "0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf",
  })
  @IsEthereumAddress()
  id!: string;

  @ApiProperty({ description: "Initial stake deposit", example: 5000 })
  @IsInt()
  @IsPositive()
  stake!: number;
}

export class AmountDto {
  @ApiProperty({ description: "Amount in stake units", example: 500 })
  @IsInt()
  @IsPositive()
  amount!: number;
}

export class ReporterResponseDto {
  @ApiProperty({ example: "0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf" })
  id!: string;

  @ApiProperty({ example: 5000 })
  stake!: number;

  @ApiProperty({ example: 50 })
  reputation!: number;

  @ApiProperty({ enum: ReporterStatus, example: ReporterStatus.Active })
  status!: ReporterStatus;

  @ApiProperty({ description: "Registration time, ms", example: 1703123456789 })
  registeredAt!: number;

  @ApiProperty({ description: "Last change, ms", example: 1703123456789 })
  updatedAt!: number;

  @ApiProperty({ description: "Outlier flags within the current window", example: 0 })
  recentFlags!: number;
}
