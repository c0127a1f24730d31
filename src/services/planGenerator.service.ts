import { UserGoal, WorkoutCategory } from "../common/common-enum";
import type { MealCatalogEntry } from "../types/model/mealCatalogEntry";
import type { Personalization } from "../types/model/personalization.model";
import type { WorkoutCatalogEntry } from "../types/model/workoutCatalogEntry";
import type {
  MealPlanItemResponse,
  WorkoutPlanItemResponse,
} from "../types/response/prediction.response";
import { MEAL_CATALOG, WORKOUT_CATALOG } from "../utils/constants";

const sameCategory = (entry: WorkoutCatalogEntry, category: WorkoutCategory) =>
  entry.type.toLowerCase() === category.toLowerCase();

export class PlanGeneratorService {
  constructor(
    private readonly meals: readonly Readonly<MealCatalogEntry>[] = MEAL_CATALOG,
    private readonly workouts: readonly Readonly<WorkoutCatalogEntry>[] = WORKOUT_CATALOG
  ) {}

  /**
   * Swaps in the alternative food when the allergy string occurs inside an
   * entry's allergen tag ("nut" matches "nuts"). AllergySafe is reported as
   * true for every item either way.
   */
  generateMealPlan(userAllergy: string): MealPlanItemResponse[] {
    return this.meals.map((entry) => {
      const substitute =
        userAllergy !== "" && entry.allergen.toLowerCase().includes(userAllergy);

      return {
        Meal: entry.meal,
        Food: substitute ? entry.alternative : entry.food,
        Calories: entry.calories,
        AllergySafe: true,
      };
    });
  }

  /** Unrecognized goals produce an empty plan. */
  generateWorkoutPlan(userGoal: string): WorkoutPlanItemResponse[] {
    return this.workouts
      .filter((entry) => {
        if (userGoal === UserGoal.MUSCLE_GAIN) {
          return sameCategory(entry, WorkoutCategory.STRENGTH);
        }
        if (userGoal === UserGoal.WEIGHT_LOSS) {
          return sameCategory(entry, WorkoutCategory.CARDIO);
        }
        return userGoal === UserGoal.GENERAL_FITNESS;
      })
      .map((entry) => ({
        Exercise: entry.exercise,
        Type: entry.type,
        "Reps/Sets": entry.repsSets,
        CaloriesBurned: entry.caloriesBurned,
      }));
  }

  generatePlans(personalization: Personalization) {
    return {
      mealPlan: this.generateMealPlan(personalization.userAllergy),
      workoutPlan: this.generateWorkoutPlan(personalization.userGoal),
    };
  }
}

export const planGeneratorService = new PlanGeneratorService();
