import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner } from "@/services/FileSystemScanner";
import { parseDateTime, parseTimeStamps } from "@/utils/timeStamps";

export type LidarMatchError =
  | { type: "NO_IMAGE_TIMESTAMP"; message: string }
  | { type: "INVALID_LIDAR_TIMESTAMP"; message: string }
  | { type: "SCAN_FAILED"; message: string }
  | { type: "NO_MATCH"; message: string };

export type LidarMatch = {
  lidarPath: string;
  /** 與影像時間的差距 (毫秒) */
  deltaMs: number;
};

/**
 * 在 <lidarFolder>/paired 中找出時間最接近影像的光達檔。
 * paired 檔案的時間位於檔案涵蓋範圍的中間。
 */
export class LidarMatcher {
  constructor(private readonly scanner: FileSystemScanner) {}

  async findMatchingLidarFile(
    imageFile: string,
    lidarFolder: string
  ): Promise<Result<LidarMatch, LidarMatchError>> {
    const stamps = parseTimeStamps(imageFile);
    const imageTime = stamps && parseDateTime(stamps[0], stamps[1]);
    if (!imageTime) {
      return err({
        type: "NO_IMAGE_TIMESTAMP",
        message: `無法從檔名解析日期與時間: ${imageFile}`,
      });
    }

    const pairedFolder = path.join(lidarFolder, "paired");
    const scanned = await this.scanner.scan(pairedFolder, {
      recursive: false,
      allowExts: [".csv"],
    });
    if (!scanned.ok) {
      return err({ type: "SCAN_FAILED", message: scanned.error.message });
    }

    let best: LidarMatch | undefined;
    for (const lidarPath of scanned.value) {
      const lidarStamps = parseTimeStamps(lidarPath);
      if (!lidarStamps) continue;
      // 光達檔的秒數是 1-60
      const lidarTime = parseDateTime(lidarStamps[0], lidarStamps[1], true);
      if (!lidarTime) {
        return err({
          type: "INVALID_LIDAR_TIMESTAMP",
          message: `光達檔的時間無效: ${path.basename(lidarPath)}`,
        });
      }
      const deltaMs = Math.abs(imageTime.getTime() - lidarTime.getTime());
      if (!best || deltaMs < best.deltaMs) best = { lidarPath, deltaMs };
    }

    if (!best) {
      return err({
        type: "NO_MATCH",
        message: `找不到與影像相符的光達檔: ${imageFile}`,
      });
    }
    return ok(best);
  }
}
