import pino, { type Logger } from "pino";

export type LoggerFn = (msg: string, extra?: Record<string, unknown>) => void;

export type LogSink = {
  info: LoggerFn;
  warn: LoggerFn;
};

export function createLogger(): Logger {
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
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );
}

export function createLogSink(logger: Logger): LogSink {
  return {
    info: (msg, extra) => {
      if (extra) logger.info(extra, msg);
      else logger.info(msg);
    },
    warn: (msg, extra) => {
      if (extra) logger.warn(extra, msg);
      else logger.warn(msg);
    },
  };
}

export const silentLogSink: LogSink = {
  info: () => {},
  warn: () => {},
};
