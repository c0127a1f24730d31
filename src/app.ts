import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { loadConfig } from "./configs/environment";
import { accessLogger } from "./middlewares/logger.middleware";
import { rateLimiter } from "./middlewares/rate-limit.middleware";
import {
  errorMiddleware,
  notFoundMiddleware,
} from "./middlewares/error.middleware";
import type { Predictor } from "./types/model/prediction";
import { createRoutes } from "./routes";

export const createApp = (predictor: Predictor) => {
  const config = loadConfig();
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(rateLimiter);
  app.use(accessLogger);

  app.use("/", createRoutes(predictor));

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};
