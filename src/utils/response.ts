import { Response } from "express";
import type { ErrorResponse } from "../types/response/prediction.response";

export const sendSuccess = <T>(res: Response, data: T, status = 200) =>
  res.status(status).json(data);

export const sendError = (res: Response, error: string, status = 400) => {
  const payload: ErrorResponse = { error };
  return res.status(status).json(payload);
};
