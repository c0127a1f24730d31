import type { FeatureMatrix } from "./featureVector";

/** `[predictedDiet, predictedWorkout]` as the predictor returns them. */
export type PredictorOutput = readonly [number, number];

export interface PredictionResult {
  predictedDiet: number; // kcal per day
  predictedWorkout: number; // workout days per week
}

export type PredictorKind = "model" | "heuristic";

export interface Predictor {
  readonly kind: PredictorKind;
  predict(features: FeatureMatrix): PredictorOutput;
}
