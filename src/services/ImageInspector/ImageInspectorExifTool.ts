import { ExifTool } from "exiftool-vendored";
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { boundsFromWorldFile, parseWorldFile } from "@/services/Metadata/WorldFile";
import type { BoundingBox } from "@/types";
import { tfwFileOf } from "@/utils/fileNames";
import { exists } from "@/utils/helper";

import type { ImageInfo, ImageInspector, InspectError } from "./ImageInspector";

export class ImageInspectorExifTool implements ImageInspector {
  private readonly exiftool = new ExifTool({ taskTimeoutMillis: 120_000 });

  async inspect(filePath: string): Promise<Result<ImageInfo, InspectError>> {
    if (!(await exists(filePath))) {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }

    let tags: Map<string, unknown>;
    try {
      tags = new Map(Object.entries(await this.exiftool.read(filePath)));
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取影像失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }

    const error = tags.get("Error");
    if (typeof error === "string" && error !== "") {
      return err({ type: "INVALID_IMAGE", message: `${filePath}: ${error}` });
    }
    const width = tags.get("ImageWidth");
    const height = tags.get("ImageHeight");
    if (
      typeof width !== "number" ||
      typeof height !== "number" ||
      width <= 0 ||
      height <= 0
    ) {
      return err({
        type: "INVALID_IMAGE",
        message: `無法取得影像尺寸: ${filePath}`,
      });
    }

    const bounds =
      (await this.boundsFromSideCar(filePath, width, height)) ??
      boundsFromGeoTiffTags(tags, width, height);
    return ok({ filePath, width, height, bounds });
  }

  private async boundsFromSideCar(
    filePath: string,
    width: number,
    height: number
  ) {
    const tfwPath = tfwFileOf(filePath);
    if (tfwPath === filePath || !(await exists(tfwPath))) return undefined;
    const world = parseWorldFile(await readFile(tfwPath, "utf8"));
    return world ? boundsFromWorldFile(world, width, height) : undefined;
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}

function numbersOf(value: unknown): number[] {
  if (typeof value === "number") return [value];
  if (Array.isArray(value)) {
    return value.filter((v): v is number => typeof v === "number");
  }
  if (typeof value === "string") {
    return value
      .trim()
      .split(/[\s,]+/)
      .map(Number)
      .filter((n) => Number.isFinite(n));
  }
  return [];
}

/**
 * 以 GeoTIFF 的 ModelTiePoint (I J K X Y Z) 與 PixelScale (Sx Sy Sz) 計算外框。
 */
export function boundsFromGeoTiffTags(
  tags: ReadonlyMap<string, unknown>,
  width: number,
  height: number
): BoundingBox | undefined {
  const tiePoint = numbersOf(tags.get("ModelTiePoint"));
  const scale = numbersOf(tags.get("PixelScale"));
  if (tiePoint.length < 6 || scale.length < 2) return undefined;

  const [i, j, , x, y] = tiePoint;
  const [sx, sy] = scale;
  const minX = x - i * sx;
  const maxY = y + j * sy;
  return {
    minX,
    maxX: minX + width * sx,
    minY: maxY - height * sy,
    maxY,
  };
}
