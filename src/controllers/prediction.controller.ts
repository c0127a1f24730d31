import { NextFunction, Request, Response } from "express";
import { PredictionService } from "../services/prediction.service";
import { logger } from "../utils/logger";
import { sendSuccess } from "../utils/response";
import { WELCOME_MESSAGE } from "../utils/constants";

export class PredictionController {
  constructor(private readonly predictionService: PredictionService) {}

  /**
   * @route GET /
   * @desc Welcome message
   */
  welcome = (_req: Request, res: Response) => {
    sendSuccess(res, { message: WELCOME_MESSAGE });
  };

  /**
   * @route POST /predict
   * @desc Predict calorie target and workout days, with sample plans
   */
  predict = (req: Request, res: Response, next: NextFunction) => {
    try {
      const startTime = Date.now();
      const result = this.predictionService.predict(req.body);
      res.locals.predictor = this.predictionService.predictorKind;

      logger.debug(
        `[Controller] - Prediction served by ${this.predictionService.predictorKind} predictor in ${Date.now() - startTime}ms`
      );
      sendSuccess(res, result);
    } catch (error) {
      next(error);
    }
  };
}
