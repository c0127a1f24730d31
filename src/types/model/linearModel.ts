export interface LinearOutputHead {
  coefficients: number[];
  intercept: number;
}

/** Regression model exported as JSON: one linear head per prediction. */
export interface LinearModelArtifact {
  featureOrder?: string[];
  scaler?: {
    mean: number[];
    scale: number[];
  };
  outputs: {
    diet: LinearOutputHead;
    workout: LinearOutputHead;
  };
}
