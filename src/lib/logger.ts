import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "defi-risk-model" }
});

export const moduleLogger = (module: string) => logger.child({ module });
