export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogRecord = {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
};

type LogHandler = (entry: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minLevel: LogLevel = "info";

let handler: LogHandler = (entry) => {
  const prefix = `${new Date(entry.timestamp).toISOString()} [${entry.level.toUpperCase()}] [${entry.module}]`;
  const msg = `${prefix} ${entry.message}`;
  // stderr only: stdout carries JSON-RPC responses in stdio mode
  if (entry.data && Object.keys(entry.data).length > 0) {
    console.error(msg, JSON.stringify(entry.data));
  } else {
    console.error(msg);
  }
};

export function setLogHandler(h: LogHandler): void {
  handler = h;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export type Logger = {
  debug: (msg: string, data?: Record<string, unknown>) => void;
  info: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
  error: (msg: string, data?: Record<string, unknown>) => void;
};

export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    handler({ level, module, message, data, timestamp: Date.now() });
  };

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
  };
}
