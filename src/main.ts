import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig, validateConfig } from "./configs/environment";
import { resolvePredictor } from "./loaders/modelLoader";
import { logger } from "./utils/logger";

class DietWorkoutApplication {
  private server: Server | null = null;

  async initialize() {
    logger.info("Starting Diet & Workout API ...");
    try {
      // Validate environment upfront
      validateConfig();
      const config = loadConfig();

      // Model load fails open to the heuristic predictor
      const predictor = resolvePredictor(config.predictor);
      logger.info(`Using ${predictor.kind} predictor`);

      const app = createApp(predictor);
      await new Promise<void>((resolve, reject) => {
        this.server = app
          .listen(config.port, () => resolve())
          .once("error", reject);
      });
      logger.info(`Diet & Workout API listening on port ${config.port}`);
    } catch (error) {
      logger.error("Failed to initialize application:", error);
      process.exit(1);
    }
  }

  async shutdown() {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    this.server = null;
    logger.info("Server closed");
  }
}

export { DietWorkoutApplication };
