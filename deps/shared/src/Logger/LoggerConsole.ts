import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
} from "./Logger";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type StackAnchor = (...args: never[]) => unknown;

type Message = {
  plain: string;
  colored: string;
  values: unknown[];
};

export class LoggerConsole implements Logger {
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  private readonly level: LogLevel;
  private readonly path: readonly string[];
  private readonly context: LogContext;
  private readonly emojiMap: EmojiMap;
  private readonly transports: LogTransport[];

  constructor(
    level: LogLevel,
    path: readonly string[] = [],
    context: LogContext = {},
    emojiMap: EmojiMap = {},
    transports: LogTransport[] = []
  ) {
    this.level = level;
    this.path = path;
    this.context = context;
    this.emojiMap = emojiMap;
    this.transports = transports;
    this.debug = this.method("debug");
    this.info = this.method("info");
    this.warn = this.method("warn");
    this.error = this.method("error");
  }

  extend(name: string, context: LogContext = {}): Logger {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): Logger {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    // 子 logger 共用同一組 transport
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private method(level: LogLevel): LogMethod {
    const emit = (context: LogContext, message: Message, anchor: StackAnchor) =>
      this.emit(level, context, message, anchor);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): LogTemplate;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): LogTemplate | undefined {
      if (typeof contextOrMessage === "string") {
        emit({}, plainMessage(contextOrMessage), log);
        return undefined;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        emit(context, plainMessage(message), log);
        return undefined;
      }
      const template: LogTemplate = function template(strings, ...values) {
        emit(context, templateMessage(strings, values), template);
      };
      return template;
    }

    return log;
  }

  private emit(
    level: LogLevel,
    callContext: LogContext,
    message: Message,
    anchor: StackAnchor
  ) {
    if (levelRank[level] < levelRank[this.level]) return;

    const merged: LogContext = { ...this.context, ...callContext };
    const { event, emoji: _emoji, error, ...rest } = merged;
    const fields: Record<string, unknown> = { ...rest };
    message.values.forEach((value, index) => {
      fields[`__${index}`] = value;
    });

    const eventName = typeof event === "string" ? event : undefined;
    const label = [...this.path, eventName ?? level].join(":");
    const emoji = this.pickEmoji(level, callContext, eventName);
    const errRecord = toErrorRecord(level, error, message.plain, anchor);

    const json = Object.keys(fields).length > 0 ? safeStringify(fields) : "";
    const line = [
      kleur.gray(new Date().toISOString()),
      emoji,
      `${label}: ${message.colored}`,
      json ? kleur.dim(json) : "",
    ]
      .filter((part) => part !== "")
      .join(" ");

    switch (level) {
      case "error":
        console.error(line);
        if (errRecord?.stack) console.error(errRecord.stack);
        break;
      case "warn":
        console.warn(line);
        break;
      case "debug":
        console.debug(line);
        break;
      default:
        console.info(line);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event: eventName,
      msg: message.plain,
      context: fields,
      err: errRecord,
    };
    for (const transport of this.transports) {
      try {
        transport.write(record);
      } catch (e) {
        console.error("log transport 寫入失敗", e);
      }
    }
  }

  private pickEmoji(
    level: LogLevel,
    callContext: LogContext,
    event: string | undefined
  ): string {
    if (typeof callContext.emoji === "string") return callContext.emoji;
    const byEvent = event ? this.emojiMap[event] : undefined;
    if (byEvent) return byEvent;
    const inherited =
      typeof this.context.emoji === "string" ? this.context.emoji : undefined;
    // warn / error 一律顯示等級圖示，避免被模組圖示蓋掉
    if (level === "warn" || level === "error") {
      return this.emojiMap[level] ?? inherited ?? "";
    }
    return inherited ?? this.emojiMap[level] ?? "";
  }
}

function plainMessage(message: string): Message {
  return { plain: message, colored: message, values: [] };
}

function templateMessage(
  strings: TemplateStringsArray,
  values: unknown[]
): Message {
  let plain = strings[0] ?? "";
  let colored = plain;
  values.forEach((value, index) => {
    const text = formatValue(value);
    const tail = strings[index + 1] ?? "";
    plain += text + tail;
    colored += kleur.green(text) + tail;
  });
  return { plain, colored, values };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return safeStringify(value);
  return String(value);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? { name: v.name, message: v.message } : v
    );
  } catch {
    return "[unserializable]";
  }
}

function toErrorRecord(
  level: LogLevel,
  error: unknown,
  message: string,
  anchor: StackAnchor
): LogRecord["err"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (error !== undefined) {
    return { name: "NonError", message: formatValue(error) };
  }
  if (level !== "error") return undefined;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, anchor);
  return { name: "Error", message, stack: holder.stack };
}
