/**
 * Body of a successful `POST /predict`. Key names and spelling are part of
 * the public contract and are kept exactly as clients read them.
 */
export interface PredictionResponse {
  PredictedDiet: string;
  PredictedWorkout: string;
  MealPlan: MealPlanItemResponse[];
  WorkoutPlan: WorkoutPlanItemResponse[];
}

export interface MealPlanItemResponse {
  Meal: string;
  Food: string;
  Calories: string;
  // true on every item, substituted or not
  AllergySafe: true;
}

export interface WorkoutPlanItemResponse {
  Exercise: string;
  Type: string;
  "Reps/Sets": string;
  CaloriesBurned: string;
}

export interface ErrorResponse {
  error: string;
}
