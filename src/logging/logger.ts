import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type GateLogger = {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function createLogger(level?: LogLevel): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const isTest = process.env.NODE_ENV === "test";

  return pino({
    name: "boot-gate",
    level: level ?? (isTest ? "silent" : isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && !isTest && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
