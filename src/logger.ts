import pino, { type Logger } from "pino";

export type LoggerFn = (msg: string, extra?: Record<string, unknown>) => void;

export const noopLog: LoggerFn = () => {};

// stdout carries the MCP stream, so every log line goes to stderr (fd 2).
// `pretty` left unset means pretty output on an interactive stderr outside production.
export function createLogger(opts?: { level?: string; pretty?: boolean }) {
  const level = opts?.level?.trim() ? opts.level.trim() : "info";

  const pretty = opts?.pretty ?? (process.env.NODE_ENV !== "production" && process.stderr.isTTY === true);

  const destination = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          messageFormat: "{msg}",
          destination: 2,
        },
      })
    : pino.destination(2);

  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

export function toLoggerFn(logger: Logger, level: "info" | "debug" | "warn" = "info"): LoggerFn {
  return (msg, extra) => {
    if (extra) logger[level](extra, msg);
    else logger[level](msg);
  };
}
