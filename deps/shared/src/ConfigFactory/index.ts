import {
  type SchemaOptions,
  type StaticDecode,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type EnvSource = Record<string, string | undefined>;

/**
 * 以 TypeBox schema 描述環境變數，回傳一個讀取並解碼設定的函式。
 * 只挑 schema 宣告過的 key；空字串視同未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  source: () => EnvSource = () => process.env
) {
  return (): StaticDecode<T> => {
    const env = source();
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const raw = Value.Default(schema, picked);
    if (!Value.Check(schema, raw)) {
      const details = [...Value.Errors(schema, raw)]
        .map((e) => `${e.path.replace(/^\//, "")}: ${e.message}`)
        .join("; ");
      throw new Error(`環境變數設定錯誤: ${details}`);
    }
    return Value.Decode(schema, raw);
  };
}

/** "true" / "false" / "1" / "0" → boolean */
export function envBoolean(options?: { default?: boolean }) {
  const schemaOptions: SchemaOptions =
    options?.default === undefined
      ? {}
      : { default: options.default ? "true" : "false" };
  return t
    .Transform(
      t.Union(
        [t.Literal("true"), t.Literal("false"), t.Literal("1"), t.Literal("0")],
        schemaOptions
      )
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

/** 數字字串 → number */
export function envNumber(options?: {
  default?: number;
  minimum?: number;
}) {
  const schemaOptions: SchemaOptions =
    options?.default === undefined ? {} : { default: String(options.default) };
  const minimum = options?.minimum;
  return t
    .Transform(t.String({ pattern: "^-?\\d+(\\.\\d+)?$", ...schemaOptions }))
    .Decode((v) => {
      const n = Number(v);
      if (minimum !== undefined && n < minimum) {
        throw new Error(`必須 >= ${minimum}: ${v}`);
      }
      return n;
    })
    .Encode((v) => String(v));
}
