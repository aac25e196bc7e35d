import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  type SpecialCase,
  type SpecialCaseError,
  SpecialCaseFileSchema,
  type SpecialCaseStore,
} from "./SpecialCases";

export const defaultSpecialCasesPath = fileURLToPath(
  new URL("../../../config/special_cases.json", import.meta.url)
);

export class SpecialCaseStoreJson implements SpecialCaseStore {
  constructor(private readonly filePath: string = defaultSpecialCasesPath) {}

  async load(): Promise<Result<SpecialCase[], SpecialCaseError>> {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(this.filePath, "utf8"));
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取特例設定失敗: ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
    if (!Value.Check(SpecialCaseFileSchema, data)) {
      const details = [...Value.Errors(SpecialCaseFileSchema, data)]
        .map((e) => `${e.path}: ${e.message}`)
        .join("; ");
      return err({
        type: "INVALID_FILE",
        message: `特例設定格式錯誤: ${this.filePath}: ${details}`,
      });
    }
    return ok(data.cases);
  }
}
