import { Module } from "@nestjs/common";
import { RegistryModule } from "@/registry/registry.module";
import { AnomalySlashingService } from "./anomaly-slashing.service";

@Module({
  imports: [RegistryModule],
  providers: [AnomalySlashingService],
  exports: [AnomalySlashingService],
})
export class SlashingModule {}
