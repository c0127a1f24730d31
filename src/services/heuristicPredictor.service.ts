import type { FeatureMatrix } from "../types/model/featureVector";
import type { Predictor, PredictorOutput } from "../types/model/prediction";
import { HEURISTIC_CONSTANTS } from "../utils/constants";
import { featureIndex } from "./featureVector.service";

const BMR_INDEX = featureIndex("bmrKcal");
const ACTIVITY_INDEX = featureIndex("activityLevel");

/**
 * Stand-in used when no trained model is available: 20% above BMR for
 * calories, activity level plus three for workout days.
 */
export class HeuristicPredictor implements Predictor {
  readonly kind = "heuristic";

  predict(features: FeatureMatrix): PredictorOutput {
    const [row] = features;
    if (!row) {
      throw new Error("HeuristicPredictor received an empty feature matrix");
    }

    const bmrKcal = row[BMR_INDEX];
    const activityLevel = row[ACTIVITY_INDEX];

    return [
      Math.floor(bmrKcal * HEURISTIC_CONSTANTS.DIET_BMR_MULTIPLIER),
      Math.floor(activityLevel + HEURISTIC_CONSTANTS.WORKOUT_DAYS_OFFSET),
    ];
  }
}

export const heuristicPredictor = new HeuristicPredictor();
