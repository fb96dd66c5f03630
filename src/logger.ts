import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export type Logger = pino.Logger;

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? "advisor-core",
    level: options.level ?? process.env.LOG_LEVEL ?? (isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["req.headers.authorization", "user_token"],
    ...(isDev && process.env.PINO_PRETTY === "1"
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

/** Silent logger for tests and library callers that do not pass one. */
export const silentLogger: Logger = pino({ level: "silent" });
