import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { ImageInspector } from "@/services/ImageInspector";
import { parseFiveDigitFrame } from "@/utils/fileNames";

import {
  type SpacingError,
  computeImageSpacing,
  loadOrthoFootprints,
} from "./StereoSpacing";

export type ImageCameraPair = { image: string; camera: string; frame: number };

export type RunBatch = {
  index: number;
  firstFrame: number;
  lastFrame: number;
  outputFolder: string;
  pairs: ImageCameraPair[];
};

export type RunOptions = {
  startFrame?: number;
  stopFrame?: number;
  bundleLength: number;
  imageStereoInterval?: number;
  orthoFolder?: string;
  stereoAlgorithm: number;
  numThreads?: number;
  solveIntrinsics: boolean;
  isSouth: boolean;
  maxDisplacement: number;
};

export type RunPlan = {
  pairs: ImageCameraPair[];
  interval: number;
  breaks: number[];
  extraArgs: string[];
  batches: RunBatch[];
};

export type RunPlanError =
  | SpacingError
  | { type: "COUNT_MISMATCH"; message: string }
  | { type: "MISALIGNED"; image: string; camera: string; message: string }
  | { type: "NO_INTERVAL"; message: string }
  | { type: "INTERVAL_TOO_LARGE"; message: string };

/** 影像與相機檔依檔名排序後一一對應，frame 編號必須相同 */
export function pairImagesAndCameras(
  images: readonly string[],
  cameras: readonly string[]
): Result<ImageCameraPair[], RunPlanError> {
  if (images.length !== cameras.length) {
    return err({
      type: "COUNT_MISMATCH",
      message: `影像 ${images.length} 個，相機檔 ${cameras.length} 個，數量必須相同`,
    });
  }
  const pairs: ImageCameraPair[] = [];
  for (const [i, image] of images.entries()) {
    const camera = cameras[i];
    const frame = parseFiveDigitFrame(image);
    if (frame === undefined || parseFiveDigitFrame(camera) !== frame) {
      return err({
        type: "MISALIGNED",
        image,
        camera,
        message: `影像與相機檔沒有對齊: ${image} ${camera}`,
      });
    }
    pairs.push({ image, camera, frame });
  }
  return ok(pairs);
}

/** 傳給批次工具的共用參數 */
export function buildExtraArgs(options: RunOptions, interval: number) {
  const args = ["--stereo-algorithm", String(options.stereoAlgorithm)];
  if (options.numThreads) args.push("--num-threads", String(options.numThreads));
  if (options.solveIntrinsics) args.push("--solve-intrinsics");
  if (options.isSouth) args.push("--south");
  if (options.maxDisplacement) {
    args.push("--max-displacement", String(options.maxDisplacement));
  }
  args.push("--stereo-image-interval", String(interval));
  return args;
}

/**
 * 將 frame 分成互相重疊的批次。
 * 達到 bundleLength、到達結束 frame 或遇到斷點時送出一批；
 * 斷點後重新開始，否則保留最後 interval 對，讓每張影像都能當左影像。
 */
export function planBatches(
  pairs: readonly ImageCameraPair[],
  options: {
    startFrame?: number;
    stopFrame?: number;
    bundleLength: number;
    interval: number;
    breaks: readonly number[];
  },
  outputFolder: string
): RunBatch[] {
  const inRange = pairs.filter(
    (p) =>
      (options.startFrame === undefined || p.frame >= options.startFrame) &&
      (options.stopFrame === undefined || p.frame <= options.stopFrame)
  );
  if (inRange.length === 0) return [];
  const stop = options.stopFrame ?? inRange[inRange.length - 1].frame;
  const breaks = new Set(options.breaks);

  const batches: RunBatch[] = [];
  let current: ImageCameraPair[] = [];
  for (const pair of inRange) {
    current.push(pair);
    const hitBreak = breaks.has(pair.frame);
    if (current.length < options.bundleLength && pair.frame < stop && !hitBreak) {
      continue;
    }

    const firstFrame = current[0].frame;
    const lastFrame = current[current.length - 1].frame;
    batches.push({
      index: batches.length,
      firstFrame,
      lastFrame,
      outputFolder: path.join(outputFolder, `batch_${firstFrame}_${lastFrame}`),
      pairs: current,
    });
    current = hitBreak ? [] : current.slice(-options.interval);
  }
  return batches;
}

/** 批次工具的完整參數 */
export function batchArgs(
  batch: RunBatch,
  lidarFolder: string,
  extraArgs: readonly string[]
) {
  return [
    "--lidar-overlay",
    "--lidar-folder",
    lidarFolder,
    batch.outputFolder,
    ...batch.pairs.map((p) => p.image),
    ...batch.pairs.map((p) => p.camera),
    ...extraArgs,
  ];
}

export class RunPlanner {
  private readonly scanner: FileSystemScanner;
  private readonly inspector: ImageInspector;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    inspector: ImageInspector;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.inspector = deps.inspector;
    this.logger = deps.logger.extend("RunPlanner");
  }

  async plan(
    folders: { images: string; cameras: string; output: string },
    options: RunOptions
  ): Promise<Result<RunPlan, RunPlanError>> {
    const images = await this.scanner.scan(folders.images, {
      recursive: false,
      allowExts: [".tif"],
      excludes: ["_sub"],
    });
    if (!images.ok) return err({ type: "SCAN_FAILED", message: images.error.message });
    const cameras = await this.scanner.scan(folders.cameras, {
      recursive: false,
      allowExts: [".tsai"],
    });
    if (!cameras.ok) return err({ type: "SCAN_FAILED", message: cameras.error.message });

    const imageFiles = images.value.filter((f) => path.extname(f) === ".tif");
    const cameraFiles = cameras.value.filter((f) => path.extname(f) === ".tsai");
    const paired = pairImagesAndCameras(imageFiles, cameraFiles);
    if (!paired.ok) return paired;
    const pairs = paired.value;

    let interval = options.imageStereoInterval;
    let breaks: number[] = [];
    if (options.orthoFolder) {
      this.logger.info()`以正射影像計算立體像對間隔 ${options.orthoFolder}`;
      const footprints = await loadOrthoFootprints(options.orthoFolder, {
        scanner: this.scanner,
        inspector: this.inspector,
      });
      if (!footprints.ok) return footprints;
      const spacing = computeImageSpacing(footprints.value, this.logger);
      if (!spacing.ok) return spacing;
      breaks = spacing.value.breaks;
      if (interval === undefined) {
        interval = spacing.value.interval;
        if (interval >= pairs.length) {
          return err({
            type: "INTERVAL_TOO_LARGE",
            message: `自動計算的間隔 ${interval} 不小於影像數 ${pairs.length}`,
          });
        }
      }
    }
    if (interval === undefined) {
      return err({
        type: "NO_INTERVAL",
        message: "需要 --image-stereo-interval 或 --ortho-folder",
      });
    }
    if (options.imageStereoInterval !== undefined) {
      this.logger.info()`使用指定的立體像對間隔 ${interval}`;
    }

    const batches = planBatches(
      pairs,
      {
        startFrame: options.startFrame,
        stopFrame: options.stopFrame,
        bundleLength: options.bundleLength,
        interval,
        breaks,
      },
      folders.output
    );
    this.logger.info({ breaks })`共 ${batches.length} 個批次`;
    return ok({
      pairs,
      interval,
      breaks,
      extraArgs: buildExtraArgs(options, interval),
      batches,
    });
  }
}
