/**
 * Body composition readings sent on every prediction request.
 * `gender` is 0 (male) / 1 (female), `activityLevel` is
 * 0 (sedentary) / 1 (moderate) / 2 (active).
 */
export interface UserProfile {
  age: number;
  gender: number;
  heightCm: number;
  weightKg: number;
  bmi: number;
  bodyFatPercent: number;
  muscleMassKg: number;
  boneMassKg: number;
  waterPercent: number;
  bmrKcal: number;
  visceralFat: number;
  metabolicAge: number;
  activityLevel: number;
}
