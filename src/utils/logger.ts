import winston from "winston";

import { config } from "@/config/config";

const logLevel = config.nodeEnv === "production" ? "info" : "debug";

// Errors passed as metadata (`{ error }`) would otherwise serialize as `{}`.
const serializeErrorFields = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: config.nodeEnv === "test",
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.errors({ stack: true }),
    serializeErrorFields(),
    winston.format.json(),
  ),
  defaultMeta: { service: "notification-delivery" },
  transports: [new winston.transports.Console()],
});
