import pino from "pino";

/**
 * Base pino logger for the API. JSON lines with ISO timestamps and a fixed
 * service label so the arena's logs can be filtered per process.
 */
export const apiLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "ctf-arena-api" },
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export const createRequestLogger = (requestId: string) =>
  apiLogger.child({ requestId });
