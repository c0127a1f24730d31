import { z } from "zod";
import { PERSONALIZATION_DEFAULTS } from "../utils/constants";

// Required readings are only type-checked here; presence is enforced
// earlier by requireParameters so the client gets a 400 naming the field.
export const userProfileSchema = z
  .object({
    age: z.number(),
    gender: z.number(),
    height_cm: z.number(),
    weight_kg: z.number(),
    bmi: z.number(),
    body_fat_percent: z.number(),
    muscle_mass_kg: z.number(),
    bone_mass_kg: z.number(),
    water_percent: z.number(),
    bmr_kcal: z.number(),
    visceral_fat: z.number(),
    metabolic_age: z.number(),
    activity_level: z.number(),
  })
  .transform((body) => ({
    age: body.age,
    gender: body.gender,
    heightCm: body.height_cm,
    weightKg: body.weight_kg,
    bmi: body.bmi,
    bodyFatPercent: body.body_fat_percent,
    muscleMassKg: body.muscle_mass_kg,
    boneMassKg: body.bone_mass_kg,
    waterPercent: body.water_percent,
    bmrKcal: body.bmr_kcal,
    visceralFat: body.visceral_fat,
    metabolicAge: body.metabolic_age,
    activityLevel: body.activity_level,
  }));

export const personalizationSchema = z
  .object({
    user_allergy: z.string().default(PERSONALIZATION_DEFAULTS.userAllergy),
    user_preference: z
      .string()
      .default(PERSONALIZATION_DEFAULTS.userPreference),
    diet_type: z.string().default(PERSONALIZATION_DEFAULTS.dietType),
    workout_preference: z
      .string()
      .default(PERSONALIZATION_DEFAULTS.workoutPreference),
    user_goal: z.string().default(PERSONALIZATION_DEFAULTS.userGoal),
  })
  .transform((body) => ({
    userAllergy: body.user_allergy.toLowerCase(),
    userPreference: body.user_preference.toLowerCase(),
    dietType: body.diet_type,
    workoutPreference: body.workout_preference,
    userGoal: body.user_goal.toLowerCase(),
  }));

export type PredictRequestBody = z.input<typeof userProfileSchema> &
  z.input<typeof personalizationSchema>;
