import type { WorkoutCategory } from "../../common/common-enum";

export interface WorkoutCatalogEntry {
  exercise: string;
  type: WorkoutCategory;
  repsSets: string;
  caloriesBurned: string;
}
