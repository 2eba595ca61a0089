import { Module } from "@nestjs/common";
import { ReporterRegistryService } from "./reporter-registry.service";

@Module({
  providers: [ReporterRegistryService],
  exports: [ReporterRegistryService],
})
export class RegistryModule {}
