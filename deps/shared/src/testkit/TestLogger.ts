import {
  type LogLevel,
  LoggerConsole,
  defaultEmojiMap,
  logLevels,
} from "../Logger";

/** 測試用 logger，預設只輸出 error，可用 TEST_LOG_LEVEL 調整 */
export function buildTestLogger(level?: LogLevel) {
  const envLevel = logLevels.find(
    (candidate) => candidate === process.env.TEST_LOG_LEVEL
  );
  return new LoggerConsole(
    level ?? envLevel ?? "error",
    ["test"],
    {},
    defaultEmojiMap
  );
}
