import pino, { type Logger } from "pino";

export interface LoggingOptions {
  level: string;
  pretty: boolean;
}

let loggerInstance: Logger | null = null;

export function configureLogger(options: LoggingOptions): Logger {
  loggerInstance = pino({
    level: options.level,
    base: undefined,
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
          },
        }
      : undefined,
  });
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = pino({
      level: "info",
      base: undefined,
    });
  }
  return loggerInstance;
}

export type { Logger };
