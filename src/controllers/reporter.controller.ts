import { BadRequestException, Body, Controller, Get, HttpCode, Param, Post, Query } from "@nestjs/common";
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { ReporterStatus, type ReporterView } from "@/common/types/core";
import type { ApiResponse as ApiEnvelope } from "@/common/types/http";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import { AmountDto, RegisterReporterDto, ReporterResponseDto } from "./dto/reporter.dto";

export interface ReporterSummary {
  id: string;
  stake: number;
  reputation: number;
  status: ReporterStatus;
  registeredAt: number;
  updatedAt: number;
  recentFlags: number;
}

function isReporterStatus(value: string): value is ReporterStatus {
  return Object.values<string>(ReporterStatus).includes(value);
}

export function toReporterSummary(reporter: ReporterView): ReporterSummary {
  return {
    id: reporter.id,
    stake: reporter.stake,
    reputation: reporter.reputation,
    status: reporter.status,
    registeredAt: reporter.registeredAt,
    updatedAt: reporter.updatedAt,
    recentFlags: reporter.participation.filter(entry => entry.outlier).length,
  };
}

@ApiTags("Reporters")
@Controller("reporters")
export class ReporterController extends BaseController {
  constructor(private readonly registry: ReporterRegistryService) {
    super();
  }

  @Post()
  @HttpCode(201)
  @ApiOperation({
    summary: "Register a reporter",
    description: "Registers a new reporter, or re-activates a slashed one with a fresh deposit",
  })
  @ApiResponse({ status: 201, description: "Reporter registered", type: ReporterResponseDto })
  @ApiResponse({ status: 409, description: "Already registered or stake below minimum", type: HttpErrorResponseDto })
  async register(@Body() body: RegisterReporterDto): Promise<ApiEnvelope<ReporterSummary>> {
    return this.executeOperation(() => toReporterSummary(this.registry.register(body.id, body.stake)), "register");
  }

  @Get()
  @ApiOperation({ summary: "List reporters" })
  @ApiQuery({ name: "status", enum: ReporterStatus, required: false })
  @ApiResponse({ status: 200, description: "Reporters retrieved", type: [ReporterResponseDto] })
  async list(@Query("status") status?: string): Promise<ApiEnvelope<ReporterSummary[]>> {
    if (status !== undefined && !isReporterStatus(status)) {
      throw new BadRequestException(`Unknown reporter status: ${status}`);
    }
    const filter: ReporterStatus | undefined = status;
    return this.executeOperation(() => this.registry.list(filter).map(toReporterSummary), "listReporters");
  }

  @Get(":id")
  @ApiOperation({ summary: "Get a reporter" })
  @ApiResponse({ status: 200, description: "Reporter retrieved", type: ReporterResponseDto })
  @ApiResponse({ status: 404, description: "Reporter not registered", type: HttpErrorResponseDto })
  async get(@Param("id") id: string): Promise<ApiEnvelope<ReporterSummary>> {
    return this.executeOperation(() => toReporterSummary(this.registry.getOrThrow(id)), "getReporter");
  }

  @Post(":id/deposit")
  @HttpCode(200)
  @ApiOperation({ summary: "Add stake" })
  @ApiResponse({ status: 200, description: "Stake deposited", type: ReporterResponseDto })
  @ApiResponse({ status: 404, description: "Reporter not registered", type: HttpErrorResponseDto })
  async deposit(@Param("id") id: string, @Body() body: AmountDto): Promise<ApiEnvelope<ReporterSummary>> {
    return this.executeOperation(() => toReporterSummary(this.registry.deposit(id, body.amount)), "deposit");
  }

  @Post(":id/withdraw")
  @HttpCode(200)
  @ApiOperation({
    summary: "Withdraw stake",
    description: "Fails when an active reporter would drop below the minimum stake",
  })
  @ApiResponse({ status: 200, description: "Stake withdrawn", type: ReporterResponseDto })
  @ApiResponse({ status: 409, description: "Would drop below the minimum stake", type: HttpErrorResponseDto })
  async withdraw(@Param("id") id: string, @Body() body: AmountDto): Promise<ApiEnvelope<ReporterSummary>> {
    return this.executeOperation(() => toReporterSummary(this.registry.withdraw(id, body.amount)), "withdraw");
  }

  @Post(":id/reinstate")
  @HttpCode(200)
  @ApiOperation({ summary: "Reinstate a suspended reporter" })
  @ApiResponse({ status: 200, description: "Reporter active again", type: ReporterResponseDto })
  @ApiResponse({ status: 409, description: "Reporter is not suspended", type: HttpErrorResponseDto })
  async reinstate(@Param("id") id: string): Promise<ApiEnvelope<ReporterSummary>> {
    return this.executeOperation(() => toReporterSummary(this.registry.reinstate(id)), "reinstate");
  }
}
