import { MealSlot, UserGoal, WorkoutCategory } from "../common/common-enum";
import type { MealCatalogEntry } from "../types/model/mealCatalogEntry";
import type { Personalization } from "../types/model/personalization.model";
import type { UserProfile } from "../types/model/userProfile.model";
import type { WorkoutCatalogEntry } from "../types/model/workoutCatalogEntry";

/**
 * Required request parameters, in the order they are checked and in the
 * order they are fed to the predictor. Reordering changes which reading
 * lands in which model input slot.
 */
export const PROFILE_FIELDS = [
  { param: "age", key: "age" },
  { param: "gender", key: "gender" },
  { param: "height_cm", key: "heightCm" },
  { param: "weight_kg", key: "weightKg" },
  { param: "bmi", key: "bmi" },
  { param: "body_fat_percent", key: "bodyFatPercent" },
  { param: "muscle_mass_kg", key: "muscleMassKg" },
  { param: "bone_mass_kg", key: "boneMassKg" },
  { param: "water_percent", key: "waterPercent" },
  { param: "bmr_kcal", key: "bmrKcal" },
  { param: "visceral_fat", key: "visceralFat" },
  { param: "metabolic_age", key: "metabolicAge" },
  { param: "activity_level", key: "activityLevel" },
] as const satisfies readonly { param: string; key: keyof UserProfile }[];

export type RequiredParameter = (typeof PROFILE_FIELDS)[number]["param"];

export const REQUIRED_PARAMETERS: readonly RequiredParameter[] =
  PROFILE_FIELDS.map((field) => field.param);

export const FEATURE_COUNT = PROFILE_FIELDS.length;

export const PERSONALIZATION_DEFAULTS: Readonly<Personalization> =
  Object.freeze({
    userAllergy: "",
    userPreference: "",
    dietType: "Regular",
    workoutPreference: "Gym",
    userGoal: UserGoal.GENERAL_FITNESS,
  });

export const HEURISTIC_CONSTANTS = {
  DIET_BMR_MULTIPLIER: 1.2,
  WORKOUT_DAYS_OFFSET: 3,
} as const;

export const WELCOME_MESSAGE =
  "Welcome to the Diet & Workout API. Use the /predict endpoint with a POST request to get predictions.";

export const MEAL_CATALOG: readonly Readonly<MealCatalogEntry>[] =
  Object.freeze([
    Object.freeze({
      meal: MealSlot.BREAKFAST,
      food: "Oatmeal + Nuts",
      calories: "350 kcal",
      alternative: "Whole Wheat Toast",
      allergen: "nuts",
    }),
    Object.freeze({
      meal: MealSlot.LUNCH,
      food: "Grilled Chicken + Peanut Sauce",
      calories: "600 kcal",
      alternative: "Tofu + Salad",
      allergen: "nuts",
    }),
    Object.freeze({
      meal: MealSlot.DINNER,
      food: "Fish + Almond Quinoa",
      calories: "500 kcal",
      alternative: "Lentil Soup + Rice",
      allergen: "nuts",
    }),
  ]);

export const WORKOUT_CATALOG: readonly Readonly<WorkoutCatalogEntry>[] =
  Object.freeze([
    Object.freeze({
      exercise: "Bench Press",
      type: WorkoutCategory.STRENGTH,
      repsSets: "4 sets x 8 reps",
      caloriesBurned: "250 kcal",
    }),
    Object.freeze({
      exercise: "Deadlifts",
      type: WorkoutCategory.STRENGTH,
      repsSets: "4 sets x 6 reps",
      caloriesBurned: "300 kcal",
    }),
    Object.freeze({
      exercise: "Cycling",
      type: WorkoutCategory.CARDIO,
      repsSets: "30 mins",
      caloriesBurned: "400 kcal",
    }),
    Object.freeze({
      exercise: "Jump Rope",
      type: WorkoutCategory.CARDIO,
      repsSets: "15 mins",
      caloriesBurned: "150 kcal",
    }),
  ]);
