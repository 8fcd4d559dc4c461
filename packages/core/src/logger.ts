import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

let rootLogger: Logger | null = null;

function envLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case "fatal":
    case "error":
    case "warn":
    case "info":
    case "debug":
    case "trace":
    case "silent":
      return level;
    default:
      return "info";
  }
}

export function createLogger(level: LogLevel = envLevel()): Logger {
  if (rootLogger) return rootLogger;

  rootLogger = pino({
    level,
    transport:
      process.env.NODE_ENV !== "production" && level !== "silent"
        ? { target: "pino/file", options: { destination: 2 } }
        : undefined,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return rootLogger;
}

export function getLogger(name: string): Logger {
  const parent = rootLogger ?? createLogger();
  return parent.child({ component: name });
}
