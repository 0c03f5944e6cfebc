import pino from "pino";

export type { Logger } from "pino";

export const logger = pino({
  name: "asset-screener",
  level:
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === "production" ? "info" : "debug"),
});
