import { Module } from "@nestjs/common";
import { AggregatorsModule } from "@/aggregators/aggregators.module";
import { FeedStoreModule } from "@/feed-store/feed-store.module";
import { RegistryModule } from "@/registry/registry.module";
import { SlashingModule } from "@/slashing/slashing.module";
import { SubmissionsModule } from "@/submissions/submissions.module";
import { ConsensusRoundEngineService } from "./consensus-round-engine.service";

@Module({
  imports: [RegistryModule, SubmissionsModule, AggregatorsModule, FeedStoreModule, SlashingModule],
  providers: [ConsensusRoundEngineService],
  exports: [ConsensusRoundEngineService],
})
export class RoundsModule {}
