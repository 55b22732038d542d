import "dotenv/config";
import { log, createApp } from "./app";
import { ConfigError, loadConfig, type AppConfig } from "./config";
import { createServices } from "./services";

const SESSION_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌  ${error.message}\n\nCopy .env.example to .env and fix the values.\n`);
      process.exit(1);
    }
    throw error;
  }
}

(async () => {
  const config = readConfig();

  const services = await createServices(config);
  const { httpServer } = await createApp(services);

  setInterval(() => services.sessions.cleanupExpired(), SESSION_CLEANUP_INTERVAL_MS).unref();

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
})().catch((error: unknown) => {
  console.error("Failed to start:", error);
  process.exit(1);
});
