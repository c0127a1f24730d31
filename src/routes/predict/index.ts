import express from "express";
import { PredictionController } from "../../controllers/prediction.controller";
import { requireParameters } from "../../middlewares/schema-validation.middleware";
import { PredictionService } from "../../services/prediction.service";
import type { Predictor } from "../../types/model/prediction";
import { REQUIRED_PARAMETERS } from "../../utils/constants";

export const createPredictRouter = (predictor: Predictor) => {
  const router = express.Router();
  const controller = new PredictionController(new PredictionService(predictor));

  router.get("/", controller.welcome);

  /**
   * @route POST /predict
   * @desc Predict daily calories and weekly workout days from a body profile
   * @access Public
   */
  router.post(
    "/predict",
    requireParameters(REQUIRED_PARAMETERS),
    controller.predict
  );

  return router;
};
