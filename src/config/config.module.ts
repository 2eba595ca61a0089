import { Global, Module } from "@nestjs/common";
import { CLOCK, SystemClock } from "@/common/utils/clock";
import { ConfigService, ENGINE_SETTINGS_OVERRIDES, type EngineSettingsOverrides } from "./config.service";

const NO_OVERRIDES: EngineSettingsOverrides = {};

@Global()
@Module({
  providers: [
    ConfigService,
    { provide: CLOCK, useClass: SystemClock },
    // Replaced in tests through overrideProvider
    { provide: ENGINE_SETTINGS_OVERRIDES, useValue: NO_OVERRIDES },
  ],
  exports: [ConfigService, CLOCK],
})
export class ConfigModule {}
