export enum UserGoal {
  MUSCLE_GAIN = "muscle-gain",
  WEIGHT_LOSS = "weight-loss",
  GENERAL_FITNESS = "general-fitness",
}

export enum WorkoutCategory {
  STRENGTH = "Strength",
  CARDIO = "Cardio",
}

export enum MealSlot {
  BREAKFAST = "Breakfast",
  LUNCH = "Lunch",
  DINNER = "Dinner",
}
