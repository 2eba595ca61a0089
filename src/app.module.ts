import { Module, ValidationPipe } from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";

// App controllers
import { FeedController } from "@/controllers/feed.controller";
import { HealthController } from "@/controllers/health.controller";
import { MetricsController } from "@/controllers/metrics.controller";
import { ReporterController } from "@/controllers/reporter.controller";
import { SubmissionController } from "@/controllers/submission.controller";

// Core modules
import { ConfigModule } from "@/config/config.module";
import { RegistryModule } from "@/registry/registry.module";
import { RoundsModule } from "@/rounds/rounds.module";

import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { ENV_HELPERS } from "@/config/environment.constants";

@Module({
  imports: [ConfigModule, RegistryModule, RoundsModule],
  controllers: [FeedController, SubmissionController, ReporterController, HealthController, MetricsController],
  providers: [
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
    {
      provide: APP_PIPE,
      useFactory: () =>
        new ValidationPipe({
          whitelist: true,
          forbidNonWhitelisted: true,
          transform: true,
          disableErrorMessages: ENV_HELPERS.isProduction(),
        }),
    },
  ],
})
export class AppModule {}
