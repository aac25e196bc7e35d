import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import { LARGEST_FRAME, SMALLEST_FRAME } from "@/constants";
import type { FlightIndexError, FlightIndexService } from "@/services/FlightIndex";
import { type IndexFileError, readIndexFile } from "@/services/Index";
import type { FetchAdjustments } from "@/services/SpecialCases";
import type { Flight, FrameIndex, ProductType } from "@/types";
import {
  isLidarType,
  lidarTypeOfFile,
  tfwFileOf,
  xmlFileOf,
} from "@/utils/fileNames";
import { fileNonEmpty } from "@/utils/helper";

import type {
  BatchDownloadError,
  BatchDownloadSummary,
  BatchDownloader,
} from "./BatchDownloader";
import {
  type FetchValidator,
  type ValidationReport,
  hasTfwCompanion,
  hasXmlCompanion,
} from "./FetchValidator";

export type FetchRequest = {
  flight: Flight;
  type: ProductType;
  outputFolder: string;
  startFrame?: number;
  stopFrame?: number;
  allFrames: boolean;
  /** 0 或負數代表不限制 */
  maxNumToFetch: number;
  dryRun: boolean;
  skipValidate: boolean;
  refetchIndex: boolean;
  adjustments: FetchAdjustments;
};

export type FetchAttempt = {
  numFailed: number;
  type: ProductType;
  indexPath: string;
  frameRange: [number, number];
  files: string[];
  download: BatchDownloadSummary;
  validation?: ValidationReport;
};

export type FetchError = FlightIndexError | IndexFileError | BatchDownloadError;

export type FetchPlan = {
  frameRange: [number, number];
  files: string[];
  urls: string[];
};

/**
 * 列出範圍內每個 frame 要下載的檔案。
 * 光達、正射影像與 DEM 另有 XML，DEM 另有 tfw。
 */
export function planFetch(
  index: FrameIndex,
  type: ProductType,
  outputFolder: string,
  options: {
    startFrame?: number;
    stopFrame?: number;
    allFrames: boolean;
    maxNumToFetch: number;
  }
): FetchPlan {
  const frames = [...index.keys()].sort((a, b) => a - b);
  let start = options.startFrame ?? SMALLEST_FRAME;
  let stop = options.stopFrame ?? options.startFrame ?? LARGEST_FRAME;
  if (options.allFrames || isLidarType(type)) {
    start = frames.length > 0 ? frames[0] : LARGEST_FRAME;
    stop = frames.length > 0 ? frames[frames.length - 1] : SMALLEST_FRAME;
  }

  const files: string[] = [];
  const urls: string[] = [];
  for (const frame of frames) {
    if (frame < start || frame > stop) continue;
    const entry = index.get(frame);
    if (!entry) continue;
    const names = [entry.fileName];
    if (hasXmlCompanion(type)) names.push(xmlFileOf(entry.fileName));
    if (hasTfwCompanion(type)) names.push(tfwFileOf(entry.fileName));
    for (const name of names) {
      files.push(path.join(outputFolder, name));
      urls.push(`${entry.folderUrl}/${name}`);
    }
  }

  if (options.maxNumToFetch > 0 && files.length > options.maxNumToFetch) {
    files.length = options.maxNumToFetch;
    urls.length = options.maxNumToFetch;
  }
  return { frameRange: [start, stop], files, urls };
}

/** 一次完整的 抓索引 → 下載 → 驗證 */
export class FlightFetchService {
  private readonly indexService: FlightIndexService;
  private readonly downloader: BatchDownloader;
  private readonly validator: FetchValidator;
  private readonly logger: Logger;

  constructor(deps: {
    indexService: FlightIndexService;
    downloader: BatchDownloader;
    validator: FetchValidator;
    logger: Logger;
  }) {
    this.indexService = deps.indexService;
    this.downloader = deps.downloader;
    this.validator = deps.validator;
    this.logger = deps.logger.extend("FlightFetch");
  }

  async fetchOnce(request: FetchRequest): Promise<Result<FetchAttempt, FetchError>> {
    const { flight, outputFolder } = request;
    await mkdir(outputFolder, { recursive: true });

    const built = await this.indexService.buildIndex(
      flight,
      request.type,
      outputFolder,
      { refetch: request.refetchIndex, adjustments: request.adjustments }
    );
    if (!built.ok) return built;
    let { indexPath, type } = built.value;

    if (!(await fileNonEmpty(indexPath))) {
      // 有些資料夾本來就是空的，照常繼續
      this.logger.warn()`缺少索引檔 ${indexPath}`;
    }

    let read = await readIndexFile(indexPath);
    if (!read.ok) {
      this.logger.warn({ error: read.error })`索引檔無法讀取，重新抓取`;
      const rebuilt = await this.indexService.buildIndex(
        flight,
        request.type,
        outputFolder,
        { refetch: true, adjustments: request.adjustments }
      );
      if (!rebuilt.ok) return rebuilt;
      ({ indexPath, type } = rebuilt.value);
      read = await readIndexFile(indexPath);
      if (!read.ok) return read;
    }
    const index = read.value;

    if (built.value.reused && isLidarType(type)) {
      const [first] = index.values();
      type = (first && lidarTypeOfFile(first.fileName)) ?? type;
    }

    const plan = planFetch(index, type, outputFolder, request);
    if (!request.allFrames && !isLidarType(type)) {
      for (const frame of [request.startFrame, request.stopFrame]) {
        if (frame !== undefined && !index.has(frame)) {
          this.logger.warn()`這趟飛行找不到 frame ${frame}`;
        }
      }
    }
    this.logger.info({
      emoji: "🗂️",
      type,
    })`frame ${plan.frameRange[0]} ~ ${plan.frameRange[1]}，共 ${plan.files.length} 個檔案`;

    const downloaded = await this.downloader.fetchAll(plan.files, plan.urls, {
      dryRun: request.dryRun,
    });
    if (!downloaded.ok) return downloaded;

    const attempt: FetchAttempt = {
      numFailed: 0,
      type,
      indexPath,
      frameRange: plan.frameRange,
      files: plan.files,
      download: downloaded.value,
    };
    if (request.skipValidate || request.dryRun) return ok(attempt);

    const validation = await this.validator.validate(plan.files, {
      type,
      isSouth: flight.site === "AN",
      wipe: true,
    });
    attempt.validation = validation;
    attempt.numFailed = validation.failed.length;
    return ok(attempt);
  }
}

export type RetryOutcome<E> =
  | { status: "success"; attempts: number }
  | { status: "no-progress"; attempts: number; numFailed: number }
  | { status: "exhausted"; attempts: number; numFailed: number }
  | { status: "error"; attempts: number; error: E };

/**
 * 重試直到沒有失敗；失敗數與上一次相同代表沒有進展，停止。
 */
export async function retryUntilDone<E>(
  attemptOnce: (attempt: number) => Promise<Result<number, E>>,
  logger: Logger,
  maxAttempts: number
): Promise<RetryOutcome<E>> {
  let previousFailed = -1;
  let numFailed = -1;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await attemptOnce(attempt);
    if (!result.ok) return { status: "error", attempts: attempt, error: result.error };
    numFailed = result.value;
    if (numFailed === 0) return { status: "success", attempts: attempt };
    if (numFailed === previousFailed) {
      logger.warn()`第 ${attempt} 次嘗試沒有進展`;
      return { status: "no-progress", attempts: attempt, numFailed };
    }
    logger.info()`第 ${attempt} 次嘗試仍有 ${numFailed} 個檔案失敗，再試一次`;
    previousFailed = numFailed;
  }
  return { status: "exhausted", attempts: maxAttempts, numFailed };
}
