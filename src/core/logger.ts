import pino from "pino";

// any pino Logger satisfies this
export interface WarningLogger {
  warn(context: Record<string, unknown>, message: string): void;
}

function createLogger(): pino.Logger {
  return pino({
    level: process.env.LOG_LEVEL ?? "warn",
    base: {
      service: "geojson-gml-wfst"
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const logger = createLogger();

export function resolveLogger(candidate?: WarningLogger): WarningLogger {
  return candidate ?? logger;
}
