// allergy, preference and goal arrive lower-cased; dietType and
// workoutPreference keep the caller's casing
export interface Personalization {
  userAllergy: string;
  userPreference: string;
  dietType: string;
  workoutPreference: string;
  userGoal: string;
}
