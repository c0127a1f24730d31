import type { FeatureVector } from "../types/model/featureVector";
import type { Predictor, PredictionResult } from "../types/model/prediction";
import type { PredictionResponse } from "../types/response/prediction.response";
import {
  personalizationSchema,
  userProfileSchema,
} from "../validators/predict.validator";
import { buildFeatureVector, toFeatureMatrix } from "./featureVector.service";
import {
  PlanGeneratorService,
  planGeneratorService,
} from "./planGenerator.service";

// Number#toString switches to exponent notation from 1e21 upwards
const integerString = (value: number) => BigInt(Math.trunc(value)).toString();

export const formatPredictedDiet = (kcal: number) =>
  `${integerString(kcal)} kcal per day`;

export const formatPredictedWorkout = (days: number) =>
  `${integerString(days)} workout days per week`;

export class PredictionService {
  constructor(
    private readonly predictor: Predictor,
    private readonly plans: PlanGeneratorService = planGeneratorService
  ) {}

  get predictorKind() {
    return this.predictor.kind;
  }

  /**
   * Runs one request body through the pipeline. Expects every required
   * parameter to be present; a value of the wrong type throws a ZodError.
   */
  predict(body: Record<string, unknown>): PredictionResponse {
    const profile = userProfileSchema.parse(body);
    const personalization = personalizationSchema.parse(body);

    const prediction = this.runPredictor(buildFeatureVector(profile));
    const { mealPlan, workoutPlan } = this.plans.generatePlans(personalization);

    return {
      PredictedDiet: formatPredictedDiet(prediction.predictedDiet),
      PredictedWorkout: formatPredictedWorkout(prediction.predictedWorkout),
      MealPlan: mealPlan,
      WorkoutPlan: workoutPlan,
    };
  }

  private runPredictor(vector: FeatureVector): PredictionResult {
    const [diet, workout] = this.predictor.predict(toFeatureMatrix(vector));
    if (!Number.isFinite(diet) || !Number.isFinite(workout)) {
      throw new Error(
        `Predictor returned non-finite values: [${diet}, ${workout}]`
      );
    }

    return {
      predictedDiet: Math.trunc(diet),
      predictedWorkout: Math.trunc(workout),
    };
  }
}
