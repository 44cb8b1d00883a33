import { Type as t } from "@sinclair/typebox";
import { mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { buildConfigFactoryEnv, envBoolean } from "../ConfigFactory";
import type { EmojiMap, Logger } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
} from "./Logger";
export { logLevels } from "./Logger";
export { LoggerConsole } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  skip: "⏭️",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_DIR: t.Optional(t.String()),
    LOG_FILE_ENABLED: envBoolean({ default: true }),
  })
);

export function createDefaultLoggerFromEnv(): Logger {
  const config = getLoggerConfig();
  const logger = new LoggerConsole(config.LOG_LEVEL, [], {}, defaultEmojiMap);
  if (!config.LOG_FILE_ENABLED) return logger;

  const logDir =
    config.LOG_DIR ?? path.join(os.homedir(), ".file-collector", "logs");
  try {
    mkdirSync(logDir, { recursive: true });
    logger.attachTransport(
      new RfsTransport({ filename: "collector.log", rfs: { path: logDir } })
    );
  } catch (error) {
    logger.warn({ error, logDir })`無法建立日誌資料夾，僅輸出到終端機`;
  }
  return logger;
}
