import "dotenv/config";
import { DietWorkoutApplication } from "./src/main";
import { logger } from "./src/utils/logger";

const application = new DietWorkoutApplication();

const stop = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  application
    .shutdown()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error("Shutdown failed:", error);
      process.exit(1);
    });
};

process.on("SIGINT", () => stop("SIGINT"));
process.on("SIGTERM", () => stop("SIGTERM"));

application.initialize().catch((error) => {
  logger.error("Startup failed:", error);
  process.exit(1);
});
