import path from "path";
import { describe, expect, it } from "vitest";
import { PredictorUnavailableError } from "../utils/errors";
import { heuristicPredictor } from "../services/heuristicPredictor.service";
import { LinearModelPredictor } from "../services/linearModelPredictor.service";
import { ModelLoader, resolvePredictor } from "./modelLoader";

const fixture = (name: string) => path.join(__dirname, "__fixtures__", name);

const row = [30, 0, 175, 72, 23.5, 18.2, 55.4, 3.1, 57.8, 1500, 6, 28, 1];

describe("ModelLoader", () => {
  it("loads a linear model artifact", () => {
    const predictor = new ModelLoader(fixture("linear-model.json")).load();

    expect(predictor).toBeInstanceOf(LinearModelPredictor);
    expect(predictor.predict([row])).toEqual([2350, 2.5]);
  });

  it("rejects a missing file", () => {
    expect(() => new ModelLoader(fixture("absent.json")).load()).toThrow(
      PredictorUnavailableError
    );
  });

  it("rejects a file that is not JSON", () => {
    expect(() => new ModelLoader(fixture("not-json.txt")).load()).toThrow(
      /invalid JSON/
    );
  });

  it("rejects coefficients of the wrong length", () => {
    expect(() =>
      new ModelLoader(fixture("short-coefficients.json")).load()
    ).toThrow(/outputs\.diet\.coefficients/);
  });

  it("rejects a feature order that differs from the request order", () => {
    expect(() =>
      new ModelLoader(fixture("reordered-features.json")).load()
    ).toThrow(/featureOrder must be age, gender/);
  });
});

describe("resolvePredictor", () => {
  it("uses the model when it loads", () => {
    const predictor = resolvePredictor({
      mode: "auto",
      modelPath: fixture("linear-model.json"),
    });

    expect(predictor.kind).toBe("model");
  });

  it("falls back to the heuristic when the model cannot be loaded", () => {
    const predictor = resolvePredictor({
      mode: "auto",
      modelPath: fixture("absent.json"),
    });

    expect(predictor).toBe(heuristicPredictor);
  });

  it("skips loading in heuristic mode", () => {
    const predictor = resolvePredictor({
      mode: "heuristic",
      modelPath: fixture("linear-model.json"),
    });

    expect(predictor).toBe(heuristicPredictor);
  });
});
