import pino from "pino";

export type LoggerFn = (msg: string, extra?: Record<string, unknown>) => void;

export type ForgeLogger = {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
};

export function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL?.trim() ? process.env.LOG_LEVEL.trim() : "info";

  const pretty =
    process.env.LOG_PRETTY === "1" ||
    (process.env.NODE_ENV !== "production" && process.stdout.isTTY);

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          messageFormat: "{msg}",
        },
      })
    : undefined;

  return pino(
    {
      name: "driver-forge",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );
}

export function toForgeLogger(logger: pino.Logger): ForgeLogger {
  const bind =
    (level: "debug" | "info" | "warn" | "error"): LoggerFn =>
    (msg, extra) => {
      if (extra) logger[level](extra, msg);
      else logger[level](msg);
    };
  return {
    debug: bind("debug"),
    info: bind("info"),
    warn: bind("warn"),
    error: bind("error"),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
