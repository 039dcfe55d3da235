import {
  type SchemaOptions,
  type StaticDecode,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type Env = Record<string, string | undefined>;

/**
 * 環境變數的布林值："true" / "1" 為真，"false" / "0" 為假。
 */
export function envBoolean(options?: SchemaOptions) {
  return t
    .Transform(
      t.Union(
        [t.Literal("true"), t.Literal("false"), t.Literal("1"), t.Literal("0")],
        options
      )
    )
    .Decode((value) => value === "true" || value === "1")
    .Encode((value): "true" | "false" => (value ? "true" : "false"));
}

export class ConfigError extends Error {
  constructor(readonly path: string, readonly reason: string) {
    super(`環境變數設定錯誤 ${path}: ${reason}`);
    this.name = "ConfigError";
  }
}

/**
 * 以 typebox schema 解析環境變數。未宣告的變數會被忽略，預設值會先套用再解碼。
 */
export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return (env: Env = process.env): StaticDecode<T> => {
    const cleaned = Value.Clean(schema, { ...env });
    const withDefaults = Value.Default(schema, cleaned);
    const first = Value.Errors(schema, withDefaults).First();
    if (first) {
      throw new ConfigError(first.path || "/", first.message);
    }
    return Value.Decode(schema, withDefaults);
  };
}
