import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { ImageInspector } from "@/services/ImageInspector";
import type { BoundingBox } from "@/types";
import { parseFiveDigitFrame } from "@/utils/fileNames";

/** 增加間隔直到平均重疊率低於此值 */
export const MAX_OVERLAP_RATIO = 0.8;
/** 但不能低於此值 */
export const MIN_OVERLAP_RATIO = 0.4;

export type OrthoFootprint = { filePath: string; frame: number; bounds: BoundingBox };

export type ImageSpacing = {
  interval: number;
  /** 這些 frame 之後與下一張沒有重疊 */
  breaks: number[];
};

export type SpacingError =
  | { type: "TOO_FEW_IMAGES"; message: string }
  | { type: "SCAN_FAILED"; message: string }
  | { type: "NO_FOOTPRINT"; filePath: string; message: string };

export function boxArea(box: BoundingBox) {
  const width = box.maxX - box.minX;
  const height = box.maxY - box.minY;
  if (width < 0 || height < 0) return 0;
  return width * height;
}

export function intersect(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    minX: Math.max(a.minX, b.minX),
    maxX: Math.min(a.maxX, b.maxX),
    minY: Math.max(a.minY, b.minY),
    maxY: Math.min(a.maxY, b.maxY),
  };
}

/**
 * 找出兼顧覆蓋率與基線長度的立體像對間隔。
 * 只比較外框，重疊率只是估計值。
 */
export function computeImageSpacing(
  footprints: readonly OrthoFootprint[],
  logger?: Logger
): Result<ImageSpacing, SpacingError> {
  const count = footprints.length;
  const breaks: number[] = [];
  let interval = 0;
  let meanRatio = 1;

  while (meanRatio > MAX_OVERLAP_RATIO) {
    interval++;
    if (count <= interval) {
      return err({
        type: "TOO_FEW_IMAGES",
        message: `影像太少且重疊太多（${count} 張，間隔 ${interval}），請處理更多影像`,
      });
    }

    let sum = 0;
    let overlapping = 0;
    for (let i = 0; i < count - interval; i++) {
      const thisBox = footprints[i].bounds;
      const area = boxArea(intersect(thisBox, footprints[i + interval].bounds));
      const thisArea = boxArea(thisBox);
      if (area > 0) {
        sum += thisArea > 0 ? area / thisArea : 0;
        overlapping++;
      }
      if (interval === 1 && area <= 0) {
        breaks.push(footprints[i].frame);
        if (logger) logger.info()`frame ${footprints[i].frame} 之後沒有重疊`;
      }
    }
    meanRatio = overlapping > 0 ? sum / overlapping : 0;
    if (logger) logger.debug({ interval })`平均重疊率 ${meanRatio.toFixed(3)}`;
  }

  if (meanRatio < MIN_OVERLAP_RATIO && interval > 1) interval--;
  if (logger) logger.info({ breaks })`自動計算的立體像對間隔 ${interval}`;
  return ok({ interval, breaks });
}

/** 正射影像資料夾：.tif，排除 _sub 與 .tif_gray.tif */
export async function loadOrthoFootprints(
  orthoFolder: string,
  deps: { scanner: FileSystemScanner; inspector: ImageInspector }
): Promise<Result<OrthoFootprint[], SpacingError>> {
  const scanned = await deps.scanner.scan(orthoFolder, {
    recursive: false,
    excludes: ["_sub", ".tif_gray.tif"],
  });
  if (!scanned.ok) {
    return err({ type: "SCAN_FAILED", message: scanned.error.message });
  }

  const footprints: OrthoFootprint[] = [];
  for (const filePath of scanned.value.filter((f) => f.endsWith(".tif"))) {
    const frame = parseFiveDigitFrame(filePath);
    const inspected = await deps.inspector.inspect(filePath);
    if (frame === undefined || !inspected.ok || !inspected.value.bounds) {
      return err({
        type: "NO_FOOTPRINT",
        filePath,
        message: `無法取得正射影像的 frame 或外框: ${filePath}`,
      });
    }
    footprints.push({ filePath, frame, bounds: inspected.value.bounds });
  }
  return ok(footprints);
}
