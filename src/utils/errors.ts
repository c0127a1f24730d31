export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingParameterError extends HttpError {
  constructor(public readonly parameter: string) {
    super(400, `Missing parameter: '${parameter}'`);
  }
}

export class NotFoundError extends HttpError {
  constructor() {
    super(404, "Not Found");
  }
}

/**
 * Raised while loading the model artifact. Never reaches a client: startup
 * catches it and serves with the heuristic predictor instead.
 */
export class PredictorUnavailableError extends Error {
  constructor(
    public readonly modelPath: string,
    reason: string
  ) {
    super(`Predictor unavailable (${modelPath}): ${reason}`);
    this.name = "PredictorUnavailableError";
  }
}
