import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import { ConsoleLogger, type INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule, type SwaggerDocumentOptions } from "@nestjs/swagger";
import { AppModule } from "@/app.module";
import { EnhancedLoggerService } from "@/common/logging/enhanced-logger.service";
import { getEnabledLogLevels } from "@/common/types/logging";
import { ENV } from "@/config/environment.constants";

let app: INestApplication | null = null;
const logger = new ConsoleLogger("Bootstrap", { logLevels: getEnabledLogLevels(ENV.LOGGING.LOG_LEVEL) });

async function bootstrap(): Promise<void> {
  const operationId = `bootstrap_${Date.now()}`;
  const enhancedLogger = new EnhancedLoggerService("Bootstrap");
  enhancedLogger.startPerformanceTimer(operationId, "application_bootstrap", "Bootstrap");

  try {
    app = await NestFactory.create(AppModule, {
      logger: getEnabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            styleSrc: ["'self'", "'unsafe-inline'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
          },
        },
        crossOriginEmbedderPolicy: false,
      })
    );

    setupSwaggerDocumentation(app);
    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    await app.listen(port, "0.0.0.0");

    enhancedLogger.logCriticalOperation("application_startup", "Bootstrap", {
      nodeVersion: process.version,
      environment: ENV.APPLICATION.NODE_ENV,
      port,
      logLevel: ENV.LOGGING.LOG_LEVEL,
      feedsFile: ENV.APPLICATION.FEEDS_FILE,
    });
    enhancedLogger.endPerformanceTimer(operationId, true, { port });
  } catch (error) {
    const errObj = error instanceof Error ? error : new Error(String(error));
    enhancedLogger.error(errObj, {
      component: "Bootstrap",
      operation: "application_startup",
      severity: "critical",
    });
    enhancedLogger.endPerformanceTimer(operationId, false, { error: errObj.message });

    if (app) {
      await app.close().catch((closeError: unknown) => {
        logger.error("Application cleanup failed:", String(closeError));
      });
    }
    process.exit(1);
  }
}

function setupSwaggerDocumentation(application: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle("Feed Consensus Engine API")
    .setDescription(
      "Signed reporter submissions in, one stake-weighted consensus value per feed and round out. " +
        "Published values and round audit records are readable without authentication."
    )
    .setVersion("0.1.0")
    .addTag("Feeds", "Published values, feed status, round audits and operator halt/resume")
    .addTag("Submissions", "Signed reporter submissions, as JSON or in the 130-byte wire format")
    .addTag("Reporters", "Stake registry")
    .addTag("System Health", "Open rounds and halted feeds")
    .addTag("Metrics", "Per-feed submission and round outcome counters")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(application, config, options);
  SwaggerModule.setup("api-docs", application, document);
  logger.log("API documentation available at /api-docs");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }
      isShuttingDown = true;
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      gracefulShutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Error during ${signal} shutdown:`, String(error));
          process.exit(1);
        });
    });
  }

  process.on("unhandledRejection", reason => {
    logger.error(`Unhandled Rejection: ${String(reason)}`);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    return;
  }
  const startedAt = Date.now();
  // Triggers onModuleDestroy: round timers are cleared and feed writers released
  await app.close();
  app = null;
  logger.log(`Graceful shutdown completed in ${Date.now() - startedAt}ms`);
}

void bootstrap();
