import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import type { FetchValidator } from "@/services/Fetch/FetchValidator";
import { planFetch } from "@/services/Fetch/FlightFetchService";
import { type IndexFileError, indexCsvPath, readIndexFile } from "@/services/Index";
import type { ProductType } from "@/types";
import { fileExtension, isLidarType, lidarTypeOfFile } from "@/utils/fileNames";

export type FileKind = "data" | "xml" | "tfw";

export type KindCounts = {
  expected: number;
  present: number;
  valid: number;
  missing: number;
  invalid: number;
};

export type VerifyReport = {
  type: ProductType;
  indexPath: string;
  frameRange: [number, number];
  counts: Record<FileKind, KindCounts>;
  missing: string[];
  invalid: string[];
};

export function fileKindOf(filePath: string): FileKind {
  const ext = fileExtension(filePath);
  if (ext === ".xml") return "xml";
  if (ext === ".tfw") return "tfw";
  return "data";
}

function emptyCounts(): KindCounts {
  return { expected: 0, present: 0, valid: 0, missing: 0, invalid: 0 };
}

export function isComplete(report: VerifyReport) {
  return report.missing.length === 0 && report.invalid.length === 0;
}

/** 只讀本機資料夾：依索引比對已下載的檔案，不刪除任何東西 */
export class FlightVerifyService {
  private readonly validator: FetchValidator;
  private readonly logger: Logger;

  constructor(deps: { validator: FetchValidator; logger: Logger }) {
    this.validator = deps.validator;
    this.logger = deps.logger.extend("FlightVerify");
  }

  async verify(
    outputFolder: string,
    options: {
      type: ProductType;
      isSouth: boolean;
      startFrame?: number;
      stopFrame?: number;
    }
  ): Promise<Result<VerifyReport, IndexFileError>> {
    const indexPath = indexCsvPath(outputFolder, options.type);
    const read = await readIndexFile(indexPath);
    if (!read.ok) return read;
    const index = read.value;

    let type = options.type;
    if (isLidarType(type)) {
      const [first] = index.values();
      type = (first && lidarTypeOfFile(first.fileName)) ?? type;
    }

    const allFrames =
      options.startFrame === undefined && options.stopFrame === undefined;
    const plan = planFetch(index, type, outputFolder, {
      startFrame: options.startFrame,
      stopFrame: options.stopFrame,
      allFrames,
      maxNumToFetch: 0,
    });
    const validation = await this.validator.validate(plan.files, {
      type,
      isSouth: options.isSouth,
      wipe: false,
    });

    const missingSet = new Set<string>();
    const invalidSet = new Set<string>(validation.failed);
    for (const issue of validation.issues) {
      if (issue.kind === "MISSING") missingSet.add(issue.filePath);
      else invalidSet.add(issue.filePath);
    }

    const counts: Record<FileKind, KindCounts> = {
      data: emptyCounts(),
      xml: emptyCounts(),
      tfw: emptyCounts(),
    };
    const missing: string[] = [];
    const invalid: string[] = [];
    for (const filePath of plan.files) {
      const c = counts[fileKindOf(filePath)];
      c.expected++;
      if (missingSet.has(filePath)) {
        c.missing++;
        missing.push(filePath);
        continue;
      }
      c.present++;
      if (invalidSet.has(filePath)) {
        c.invalid++;
        invalid.push(filePath);
      } else {
        c.valid++;
      }
    }

    const report: VerifyReport = {
      type,
      indexPath,
      frameRange: plan.frameRange,
      counts,
      missing,
      invalid,
    };
    this.logger.info({
      event: isComplete(report) ? "done" : "warn",
      data: counts.data,
    })`檢查 ${plan.files.length} 個檔案：缺少 ${missing.length}，無效 ${invalid.length}`;
    return ok(report);
  }
}
