import { Module } from "@nestjs/common";
import { ConsensusAggregator } from "./consensus-aggregator";

@Module({
  providers: [ConsensusAggregator],
  exports: [ConsensusAggregator],
})
export class AggregatorsModule {}
