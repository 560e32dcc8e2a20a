import path from "path";
import pino from "pino";
import { LogData, Logger } from "./types";

type LogArgs<T> = [LogData<T>] | [Partial<LogData<T>>, string] | [string];

const SERVICE_NAME = "spapi-oauth-broker";
const PROJECT_ROOT = process.cwd();
const nodeEnv = process.env.NODE_ENV ?? "development";
const isProduction = nodeEnv === "production";

const defaultLevel = (): string => {
  if (nodeEnv === "test") return "silent";
  return isProduction ? "info" : "debug";
};

// pino-pretty roda em worker thread; só em desenvolvimento
const transport =
  nodeEnv === "development"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          messageFormat: "{file} {type} {msg}",
          customColors: "info:blue,warn:yellow,error:red,debug:magenta",
          levelFirst: true,
        },
      }
    : undefined;

const pinoLogger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  base: {
    service: SERVICE_NAME,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

const resolveCallerFile = (): string | undefined => {
  // Avoid stack parsing overhead in production hot paths
  if (isProduction) {
    return undefined;
  }

  const stack = new Error().stack?.split("\n").slice(3);
  if (!stack) return undefined;

  for (const line of stack) {
    const match = line.match(/\((.*):\d+:\d+\)/) ?? line.match(/at (.*):\d+:\d+/);
    const filePath = match?.[1];
    if (filePath && filePath.startsWith(PROJECT_ROOT) && !filePath.includes("logger")) {
      const relative = path.relative(PROJECT_ROOT, filePath);
      if (!relative.startsWith("node_modules")) {
        return relative.replace(/\\/g, "/");
      }
    }
  }

  return undefined;
};

const normalizeLogInput = <T>(args: LogArgs<T>): LogData<T> => {
  if (args.length === 2) {
    const [partial, message] = args;
    return {
      ...partial,
      type: partial.type ?? "HTTP_LOG",
      message,
    };
  }

  const [raw] = args;
  if (typeof raw === "string") {
    return { type: "GENERAL", message: raw };
  }

  return {
    ...raw,
    type: raw.type ?? "GENERAL",
    message: raw.message ?? "Log",
  };
};

const formatLogData = <T>({ message, error, type, payload, file }: LogData<T>) => {
  const resolvedFile = file ?? resolveCallerFile();

  return {
    msg: message,
    type: `[${type ?? "GENERAL"}]`,
    file: resolvedFile ? `[${resolvedFile}]` : "",
    payload,
    err: error,
  };
};

const logWithLevel = <T>(level: "debug" | "info" | "warn" | "error", ...args: LogArgs<T>) => {
  if (!pinoLogger.isLevelEnabled(level)) return;
  const structured = normalizeLogInput<T>(args);
  pinoLogger[level](formatLogData(structured));
};

const AppLogger: Logger = {
  debug: <T>(...args: LogArgs<T>) => logWithLevel<T>("debug", ...args),
  info: <T>(...args: LogArgs<T>) => logWithLevel<T>("info", ...args),
  warn: <T>(...args: LogArgs<T>) => logWithLevel<T>("warn", ...args),
  error: <T>(...args: LogArgs<T>) => logWithLevel<T>("error", ...args),
};

export default (): Logger => AppLogger;
export { pinoLogger };
