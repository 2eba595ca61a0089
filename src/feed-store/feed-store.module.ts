import { Module } from "@nestjs/common";
import { FeedStateStoreService } from "./feed-state-store.service";

@Module({
  providers: [FeedStateStoreService],
  exports: [FeedStateStoreService],
})
export class FeedStoreModule {}
