import { createApp } from "./app";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { createPipeline } from "./services/pipeline-factory";
import { redisClient } from "./services/redis-client";

const config = loadConfig();
const app = createApp(createPipeline(config));

// Start the server
const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, "Server is running");
  logger.info(
    {
      endpoints: [
        `GET http://localhost:${config.port}/api/enrich?ip={ip_or_cidr}`,
        `POST http://localhost:${config.port}/api/enrich`,
        `GET http://localhost:${config.port}/api/enrich/attribution`,
        `GET http://localhost:${config.port}/health`,
      ],
    },
    "API endpoints"
  );
});

// Listen for termination signals to close connections
process.on("SIGTERM", () => void shutdown());
process.on("SIGINT", () => void shutdown());

// Clean shutdown function
async function shutdown() {
  logger.info("Shutting down gracefully...");

  server.close();
  try {
    await redisClient.disconnect();
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
  }

  process.exit(0);
}
