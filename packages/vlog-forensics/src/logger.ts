import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = Readonly<{
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  level: LogLevel;
  /** Defaults to stderr so that report output on stdout stays clean */
  destination?: DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = pino(
    {
      name: "vlog-forensics",
      level: options.level,
      messageKey: "message",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    options.destination ?? pino.destination(2)
  );
  return wrap(pinoLogger);
}

function wrap(pinoLogger: PinoLogger): Logger {
  return {
    debug: (context, message) => pinoLogger.debug(context, message),
    info: (context, message) => pinoLogger.info(context, message),
    warn: (context, message) => pinoLogger.warn(context, message),
    error: (context, message) => pinoLogger.error(context, message),
    child: (baseContext) => wrap(pinoLogger.child(baseContext)),
  };
}

export const silentLogger: Logger = createLogger({
  level: "silent",
  destination: { write: () => undefined },
});
