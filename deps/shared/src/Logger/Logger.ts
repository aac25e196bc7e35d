export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

/** 每筆紀錄可附帶的上下文；event / emoji / error 有特殊處理，其餘欄位原樣輸出 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
  [key: string]: unknown;
};

export type LogRecord = {
  level: LogLevel;
  time: string;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  context: Record<string, unknown>;
};

export interface LogTransport {
  write(record: LogRecord): void;
  [Symbol.asyncDispose](): Promise<void>;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

/** key 可以是 level 或 event 名稱 */
export type EmojiMap = Record<string, string | undefined>;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，名稱會串在路徑後面（a:b:c） */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併上下文，不改變路徑 */
  append(context: LogContext): Logger;

  attachTransport(transport: LogTransport): void;
}
