import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function resolveLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? "warn";
}

// 日志统一写入 stderr，避免与 stdout 上的查询结果混在一起
const baseLogger = pino(
  {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({ dest: 2, sync: true })
);

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * 为指定组件创建日志实例。
 * @param component 组件名，写入每条日志的 component 字段
 */
export function createLogger(component: string): Logger {
  const logger = baseLogger.child({ component });

  const write =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, data?: Record<string, unknown>) => {
      if (data) {
        logger[level](data, message);
      } else {
        logger[level](message);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error")
  };
}
