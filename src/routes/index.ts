import express from "express";
import type { Predictor } from "../types/model/prediction";
import { createHealthRouter } from "./health";
import { createPredictRouter } from "./predict";

export const createRoutes = (predictor: Predictor) => {
  const router = express.Router();
  const healthRoute = createHealthRouter(predictor.kind);

  router.use("/health", healthRoute);
  router.use("/api/health", healthRoute);

  router.use("/", createPredictRouter(predictor));

  return router;
};
