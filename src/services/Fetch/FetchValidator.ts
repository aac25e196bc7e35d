import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { ImageInspector } from "@/services/ImageInspector";
import {
  checkChecksum,
  isGoodLatitude,
  isValidTfw,
  readLatitude,
} from "@/services/Metadata/XmlMetadata";
import type { ProductType } from "@/types";
import {
  fileExtension,
  hasImageExtension,
  imageFilesOfXml,
  isLidarType,
  xmlFileOf,
} from "@/utils/fileNames";
import { fileNonEmpty, wipe } from "@/utils/helper";

export type IssueKind =
  | "MISSING"
  | "INVALID_IMAGE"
  | "BAD_LATITUDE"
  | "NO_LATITUDE"
  | "BAD_CHECKSUM"
  | "BAD_TFW";

export type ValidationIssue = {
  kind: IssueKind;
  filePath: string;
  message: string;
  /** 已刪除（或在不刪除模式下應刪除）的檔案 */
  wiped: string[];
};

export type ValidationReport = {
  checked: number;
  valid: string[];
  failed: string[];
  issues: ValidationIssue[];
};

/** 這些產品的資料檔都有 XML 說明檔 */
export function hasXmlCompanion(type: ProductType) {
  return isLidarType(type) || type === "ortho" || type === "dem";
}

export function hasTfwCompanion(type: ProductType) {
  return type === "dem";
}

/**
 * 檢查下載結果：影像可讀、XML 緯度、checksum 與 tfw。
 * wipe 為 true 時刪除壞檔，讓下一輪重新下載。
 */
export class FetchValidator {
  private readonly inspector: ImageInspector;
  private readonly logger: Logger;

  constructor(deps: { inspector: ImageInspector; logger: Logger }) {
    this.inspector = deps.inspector;
    this.logger = deps.logger.extend("FetchValidator");
  }

  async validate(
    filePaths: readonly string[],
    options: { type: ProductType; isSouth: boolean; wipe: boolean }
  ): Promise<ValidationReport> {
    const report: ValidationReport = {
      checked: 0,
      valid: [],
      failed: [],
      issues: [],
    };
    const hasXml = hasXmlCompanion(options.type);
    const hasTfw = hasTfwCompanion(options.type);

    const record = async (
      kind: IssueKind,
      filePath: string,
      message: string,
      toWipe: string[],
      failed: string[]
    ) => {
      const wiped: string[] = [];
      for (const p of toWipe) {
        if (!options.wipe) {
          wiped.push(p);
        } else if (await wipe(p)) {
          wiped.push(p);
        }
      }
      report.issues.push({ kind, filePath, message, wiped });
      report.failed.push(...failed);
      this.logger.warn({ kind, wiped })`${message}: ${filePath}`;
    };

    for (const filePath of filePaths) {
      report.checked++;
      const ext = fileExtension(filePath);

      if (!(await fileNonEmpty(filePath))) {
        await record("MISSING", filePath, "缺少檔案", [], [filePath]);
        continue;
      }

      if (hasImageExtension(filePath)) {
        const inspected = await this.inspector.inspect(filePath);
        if (!inspected.ok) {
          await record(
            "INVALID_IMAGE",
            filePath,
            inspected.error.message,
            [filePath],
            [filePath]
          );
          continue;
        }
        this.logger.debug()`影像可讀 ${filePath}`;
      }

      if (ext === ".xml") {
        const latitude = await readLatitude(filePath);
        if (!latitude.ok) {
          await record(
            "NO_LATITUDE",
            filePath,
            latitude.error.message,
            [filePath],
            [filePath]
          );
          continue;
        }
        if (!isGoodLatitude(latitude.value, options.isSouth)) {
          // 另一個半球的資料：刪掉 XML 與它描述的影像，不算失敗
          await record(
            "BAD_LATITUDE",
            filePath,
            `緯度 ${latitude.value} 不在${options.isSouth ? "南" : "北"}半球`,
            [filePath, ...imageFilesOfXml(filePath)],
            []
          );
          continue;
        }
      }

      if (hasXml && ext !== ".xml" && ext !== ".tfw") {
        const check = await checkChecksum(filePath);
        if (!check.valid) {
          const xmlPath = xmlFileOf(filePath);
          await record(
            "BAD_CHECKSUM",
            filePath,
            check.reason,
            [filePath, xmlPath],
            [filePath, xmlPath]
          );
          continue;
        }
        this.logger.debug()`checksum 正確 ${path.basename(filePath)}`;
      }

      if (hasTfw && ext === ".tfw" && !(await isValidTfw(filePath))) {
        const xmlPath = xmlFileOf(filePath);
        await record(
          "BAD_TFW",
          filePath,
          "tfw 檔案無效",
          [filePath, xmlPath],
          [filePath, xmlPath]
        );
        continue;
      }

      report.valid.push(filePath);
    }

    if (report.failed.length > 0) {
      this.logger.warn({
        event: "summary",
      })`無法處理的檔案數: ${report.failed.length}`;
    }
    return report;
  }
}
