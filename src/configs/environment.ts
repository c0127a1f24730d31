import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numericString = z.string().regex(/^\d+$/, "must be a whole number");
const booleanString = z.enum(["true", "false"]);

const envSchema = z.object({
  PORT: numericString.optional(),
  NODE_ENV: z.string().optional(),

  PREDICTOR_MODE: z.enum(["auto", "heuristic"]).optional(),
  MODEL_PATH: z.string().min(1).optional(),

  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  ENABLE_CONSOLE_LOG: booleanString.optional(),
  ENABLE_FILE_LOG: booleanString.optional(),
  LOG_FILE: z.string().min(1).optional(),

  BODY_LIMIT: z.string().optional(),
  RATE_LIMIT_WINDOW: numericString.optional(),
  RATE_LIMIT_MAX: numericString.optional(),
  CORS_ORIGIN: z.string().optional(),
});

export type PredictorMode = "auto" | "heuristic";

const buildConfig = () => {
  const env = process.env;
  const predictorMode: PredictorMode =
    env.PREDICTOR_MODE === "heuristic" ? "heuristic" : "auto";

  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    predictor: {
      mode: predictorMode,
      modelPath: env.MODEL_PATH || "models/diet_workout_model.json",
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      enableConsole: env.ENABLE_CONSOLE_LOG !== "false",
      enableFile: env.ENABLE_FILE_LOG === "true",
      filePath: env.LOG_FILE || "logs/app.log",
    },
    api: {
      bodyLimit: env.BODY_LIMIT || "1mb",
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",").map((o) => o.trim()) || ["*"],
      },
    },
  };
};

export type AppConfig = ReturnType<typeof buildConfig>;

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = () => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
};
