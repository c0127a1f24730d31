import winston from "winston";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack }) =>
    stack
      ? `[${timestamp}] ${level}: ${message}\n${stack}`
      : `[${timestamp}] ${level}: ${message}`
  )
);

const transports = [
  ...(config.logging.enableConsole
    ? [new winston.transports.Console({ format: consoleFormat })]
    : []),
  ...(config.logging.enableFile
    ? [
        new winston.transports.File({
          filename: config.logging.filePath,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          ),
        }),
      ]
    : []),
];

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.nodeEnv === "test" || transports.length === 0,
  transports,
});
