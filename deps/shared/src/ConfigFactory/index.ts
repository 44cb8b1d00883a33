import {
  type SchemaOptions,
  type Static,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`環境變數設定錯誤: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** "true" / "false" 會在轉換階段變成 boolean */
export function envBoolean(options?: SchemaOptions) {
  return t.Boolean(options);
}

export function envNumber(options?: SchemaOptions) {
  return t.Number(options);
}

/**
 * 以 TypeBox schema 讀取環境變數。
 * 空字串視為未設定；套用 default 後再做型別轉換與驗證，失敗時丟出 ConfigError。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): () => Static<T> {
  return () => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const raw = env[key];
      if (raw !== undefined && raw !== "") picked[key] = raw;
    }
    const value = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, value)) {
      const issues = [...Value.Errors(schema, value)].map(
        (e) => `${e.path}: ${e.message}`
      );
      throw new ConfigError(issues);
    }
    return value;
  };
}
