import type { PredictRequestBody } from "../validators/predict.validator";

export const sampleBody = (): PredictRequestBody => ({
  age: 30,
  gender: 0,
  height_cm: 175,
  weight_kg: 72,
  bmi: 23.5,
  body_fat_percent: 18.2,
  muscle_mass_kg: 55.4,
  bone_mass_kg: 3.1,
  water_percent: 57.8,
  bmr_kcal: 1500,
  visceral_fat: 6,
  metabolic_age: 28,
  activity_level: 1,
});
