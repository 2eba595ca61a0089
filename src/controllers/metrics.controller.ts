import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { ConsensusRoundEngineService, type EngineMetrics } from "@/rounds/consensus-round-engine.service";
import { MetricsResponseDto } from "./dto/health-metrics.dto";

export type MetricsResponse = EngineMetrics & { timestamp: number; uptime: number };

@ApiTags("Metrics")
@Controller()
export class MetricsController extends BaseController {
  constructor(private readonly engine: ConsensusRoundEngineService) {
    super();
  }

  @Get("metrics")
  @ApiOperation({
    summary: "Engine counters",
    description: "Per-feed accepted submissions, rejections by reason and finalized rounds by outcome",
  })
  @ApiResponse({ status: 200, description: "Metrics retrieved", type: MetricsResponseDto })
  getMetrics(): MetricsResponse {
    const metrics = this.engine.getMetrics();
    this.logger.debug(`Metrics retrieved for ${metrics.feeds.length} feeds`);
    return { timestamp: Date.now(), uptime: this.getUptimeSeconds(), ...metrics };
  }
}
