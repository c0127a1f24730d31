import type { FeatureMatrix, FeatureVector } from "../types/model/featureVector";
import type {
  LinearModelArtifact,
  LinearOutputHead,
} from "../types/model/linearModel";
import type { Predictor, PredictorOutput } from "../types/model/prediction";

export class LinearModelPredictor implements Predictor {
  readonly kind = "model";

  constructor(private readonly artifact: LinearModelArtifact) {}

  predict(features: FeatureMatrix): PredictorOutput {
    const [row] = features;
    if (!row) {
      throw new Error("LinearModelPredictor received an empty feature matrix");
    }

    const scaled = this.standardize(row);
    return [
      this.evaluate(this.artifact.outputs.diet, scaled),
      this.evaluate(this.artifact.outputs.workout, scaled),
    ];
  }

  private standardize(row: FeatureVector): number[] {
    const { scaler } = this.artifact;
    if (!scaler) return [...row];
    return row.map((value, i) => (value - scaler.mean[i]) / scaler.scale[i]);
  }

  private evaluate(head: LinearOutputHead, row: number[]): number {
    return row.reduce(
      (sum, value, i) => sum + value * head.coefficients[i],
      head.intercept
    );
  }
}
