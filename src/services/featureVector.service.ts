import type { FeatureMatrix, FeatureVector } from "../types/model/featureVector";
import type { UserProfile } from "../types/model/userProfile.model";
import { PROFILE_FIELDS } from "../utils/constants";

export const buildFeatureVector = (profile: UserProfile): FeatureVector =>
  PROFILE_FIELDS.map((field) => profile[field.key]);

export const toFeatureMatrix = (vector: FeatureVector): FeatureMatrix => [
  vector,
];

/** Position of a profile reading inside a feature vector. */
export const featureIndex = (key: keyof UserProfile): number =>
  PROFILE_FIELDS.findIndex((field) => field.key === key);
