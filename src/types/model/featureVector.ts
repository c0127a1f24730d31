export type FeatureVector = readonly number[];

// One row per profile; the service only ever sends a single row.
export type FeatureMatrix = readonly FeatureVector[];
