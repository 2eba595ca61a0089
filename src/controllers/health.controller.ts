import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import type { CoreFeedId } from "@/common/types/core";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { ConsensusRoundEngineService } from "@/rounds/consensus-round-engine.service";
import { HealthCheckResponseDto } from "./dto/health-metrics.dto";

export interface OpenRoundSummary {
  feed: CoreFeedId;
  sequence: number;
  deadline: number;
  submissionCount: number;
  minQuorum: number;
}

export interface HealthCheckResponse {
  status: "healthy" | "degraded";
  timestamp: number;
  uptime: number;
  reporters: number;
  openRounds: OpenRoundSummary[];
  haltedFeeds: { feed: CoreFeedId; reason: string }[];
}

// Not wrapped in the success envelope: orchestration probes read it as is
@ApiTags("System Health")
@Controller()
export class HealthController extends BaseController {
  constructor(
    private readonly engine: ConsensusRoundEngineService,
    private readonly registry: ReporterRegistryService
  ) {
    super();
  }

  @Get("health")
  @ApiOperation({
    summary: "Health check endpoint",
    description: "Open rounds and halted feeds. Any halted feed makes the status degraded.",
  })
  @ApiResponse({ status: 200, description: "Health status", type: HealthCheckResponseDto })
  getHealth(): HealthCheckResponse {
    const openRounds: OpenRoundSummary[] = [];
    const haltedFeeds: HealthCheckResponse["haltedFeeds"] = [];

    for (const status of this.engine.listFeedStatuses()) {
      if (status.halted) {
        haltedFeeds.push({ feed: status.feed, reason: status.haltReason ?? "unknown" });
      } else if (status.round.phase === "collecting") {
        openRounds.push({
          feed: status.feed,
          sequence: status.round.sequence,
          deadline: status.round.deadline,
          submissionCount: status.round.submissionCount,
          minQuorum: status.round.minQuorum,
        });
      }
    }

    if (haltedFeeds.length > 0) {
      this.logWarning(`${haltedFeeds.length} feed(s) halted`, "health");
    }

    return {
      status: haltedFeeds.length > 0 ? "degraded" : "healthy",
      timestamp: Date.now(),
      uptime: this.getUptimeSeconds(),
      reporters: this.registry.size(),
      openRounds,
      haltedFeeds,
    };
  }
}
