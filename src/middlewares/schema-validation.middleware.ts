import { Request, Response, NextFunction } from "express";
import { MissingParameterError } from "../utils/errors";

export const isPlainObject = (
  value: unknown
): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Returns the first parameter in `params` that is not a key of `body`.
 * A key holding `null` counts as present.
 */
export const findMissingParameter = <P extends string>(
  body: Record<string, unknown>,
  params: readonly P[]
): P | undefined =>
  params.find((param) => !Object.prototype.hasOwnProperty.call(body, param));

export const requireParameters =
  (params: readonly string[]) =>
  (req: Request, _res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (!isPlainObject(body)) {
      return next(new Error("Request body must be a JSON object"));
    }

    const missing = findMissingParameter(body, params);
    if (missing !== undefined) {
      return next(new MissingParameterError(missing));
    }

    return next();
  };
