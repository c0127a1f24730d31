import { Request, Response } from "express";
import morgan, { StreamOptions } from "morgan";
import chalk from "chalk";
import { loadConfig } from "../configs/environment";

morgan.token("timestamp", () => chalk.gray(new Date().toISOString()));

morgan.token<Request, Response>("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  return chalk.green(status);
});

// Set by the prediction controller; "-" for routes that never predict.
morgan.token<Request, Response>("predictor", (_req, res) => {
  const kind: unknown = res.locals.predictor;
  return typeof kind === "string" ? chalk.magenta(kind) : "-";
});

const ACCESS_LOG_FORMAT =
  ":timestamp :method :url :colored-status :response-time ms predictor=:predictor";

interface AccessLoggerOptions {
  stream?: StreamOptions;
  skip?: (req: Request, res: Response) => boolean;
}

export const createAccessLogger = ({ stream, skip }: AccessLoggerOptions = {}) =>
  morgan<Request, Response>(ACCESS_LOG_FORMAT, { stream, skip });

export const accessLogger = createAccessLogger({
  skip: () => loadConfig().nodeEnv === "test",
});
