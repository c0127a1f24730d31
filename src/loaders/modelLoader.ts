import fs from "fs";
import path from "path";
import { z } from "zod";
import type { AppConfig } from "../configs/environment";
import type { LinearModelArtifact } from "../types/model/linearModel";
import type { Predictor } from "../types/model/prediction";
import { FEATURE_COUNT, REQUIRED_PARAMETERS } from "../utils/constants";
import { PredictorUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";
import { heuristicPredictor } from "../services/heuristicPredictor.service";
import { LinearModelPredictor } from "../services/linearModelPredictor.service";

const featureArray = z.array(z.number()).length(FEATURE_COUNT);

const outputHeadSchema = z.object({
  coefficients: featureArray,
  intercept: z.number(),
});

export const linearModelSchema: z.ZodType<LinearModelArtifact> = z.object({
  featureOrder: z
    .array(z.string())
    .refine(
      (order) =>
        order.length === REQUIRED_PARAMETERS.length &&
        order.every((name, i) => name === REQUIRED_PARAMETERS[i]),
      { message: `featureOrder must be ${REQUIRED_PARAMETERS.join(", ")}` }
    )
    .optional(),
  scaler: z
    .object({
      mean: featureArray,
      scale: featureArray.refine((scale) => scale.every((s) => s !== 0), {
        message: "scale entries must be non-zero",
      }),
    })
    .optional(),
  outputs: z.object({
    diet: outputHeadSchema,
    workout: outputHeadSchema,
  }),
});

export class ModelLoader {
  constructor(private readonly modelPath: string) {}

  /** Reads and validates the artifact; throws PredictorUnavailableError. */
  load(): LinearModelPredictor {
    const resolved = path.resolve(this.modelPath);

    let raw: string;
    try {
      raw = fs.readFileSync(resolved, "utf8");
    } catch (error) {
      throw new PredictorUnavailableError(
        resolved,
        error instanceof Error ? error.message : String(error)
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PredictorUnavailableError(
        resolved,
        `invalid JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }

    const parsed = linearModelSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join(", ");
      throw new PredictorUnavailableError(resolved, issues);
    }

    return new LinearModelPredictor(parsed.data);
  }
}

/**
 * Picks the predictor for the process. A model that cannot be loaded is
 * logged and replaced by the heuristic; this never throws.
 */
export const resolvePredictor = (
  predictorConfig: AppConfig["predictor"]
): Predictor => {
  if (predictorConfig.mode === "heuristic") {
    logger.info("Predictor mode is 'heuristic', skipping model load");
    return heuristicPredictor;
  }

  try {
    const predictor = new ModelLoader(predictorConfig.modelPath).load();
    logger.info(`Loaded prediction model from ${predictorConfig.modelPath}`);
    return predictor;
  } catch (error) {
    logger.warn("Falling back to heuristic predictor:", error);
    return heuristicPredictor;
  }
};
