// Import env config first (loads .env and validates it immediately)
import { env, isOpenAIConfigured } from "./config/env";
import { logger, closeLogFile } from "./config/logger";
import { buildDependencies, createApp } from "./app";

async function start(): Promise<void> {
  const deps = buildDependencies();
  const app = createApp(deps);

  if (deps.orchestrator.providerName === "openai" && !isOpenAIConfigured()) {
    logger.warn(
      "server",
      "OPENAI_API_KEY is not set. Image requests will fail with UPSTREAM_NOT_CONFIGURED; set IMAGE_PROVIDER=mock for development."
    );
  }

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      provider: deps.orchestrator.providerName,
      rateLimit: `${env.RATE_LIMIT_PER_MINUTE}/${env.RATE_LIMIT_WINDOW_MS}ms`,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/health`);
  });

  const upstreamReachable = await deps.orchestrator.checkStatus();
  logger.info("server", `Image provider ${deps.orchestrator.providerName} is ${upstreamReachable ? "reachable" : "unreachable"}`);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    deps.gate.stop();
    server.close(() => {
      logger.info("server", "Server shut down.");
      closeLogFile()
        .catch((err: unknown) => {
          console.error("Failed to flush log file", err);
        })
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  logger.error("server", "Failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
