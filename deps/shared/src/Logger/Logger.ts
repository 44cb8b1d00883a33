export const logLevels = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會取代輸出中的 level 標籤 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

/**
 * 同時支援兩種寫法：
 *   logger.info({ count }, "訊息")
 *   logger.info({ count })`訊息 ${count}`
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): LogTemplate;
}

export interface Logger extends AsyncDisposable {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，name 會串在 path 後方 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變 path */
  append(context: LogContext): Logger;
  attachTransport(transport: LogTransport): void;
}

export type EmojiMap = Partial<Record<string, string>>;
