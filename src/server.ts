import { createApp, createScreeningServices } from "./app";
import { loadEnv } from "./config/env";
import { createLogger } from "./config/logger";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({
    minLevel: env.logLevel,
    webhook: {
      url: env.logWebhookUrl,
      minLevel: env.logWebhookLevel,
    },
  });
  const services = await createScreeningServices(env, logger);
  const app = createApp({ registry: services.registry, logger });

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("LLM chat model", { model: services.generationPort.getModelName?.() ?? env.openaiChatModel });
    logger.info("Screening settings", {
      maxAttempts: env.maxAttempts,
      questionsPerTechnology: env.questionsPerTechnology,
      acknowledgementMode: env.acknowledgementMode,
      exportCsvPath: env.exportCsvPath,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(
    `${JSON.stringify({
      timestamp: new Date().toISOString(),
      level: "error",
      message: "Startup failed",
      meta: {
        name: error instanceof Error ? error.name : "Error",
        error: error instanceof Error ? error.message : "Unknown error",
      },
    })}\n`,
  );
  process.exitCode = 1;
});
