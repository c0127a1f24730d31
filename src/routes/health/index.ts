import express from "express";
import type { PredictorKind } from "../../types/model/prediction";
import { loadConfig } from "../../configs/environment";

export const createHealthRouter = (predictorKind: PredictorKind) => {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Diet & Workout API is healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: loadConfig().nodeEnv,
      predictor: predictorKind,
    });
  });

  return healthRouter;
};
