import type { MealSlot } from "../../common/common-enum";

export interface MealCatalogEntry {
  meal: MealSlot;
  food: string;
  calories: string;
  alternative: string;
  allergen: string;
}
