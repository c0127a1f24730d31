import { rateLimit } from "express-rate-limit";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

export const rateLimiter = rateLimit({
  windowMs: config.api.rateLimit.windowMs,
  max: config.api.rateLimit.max,
  message: { error: "Too Many Requests" },
  standardHeaders: true,
  legacyHeaders: false,
});
