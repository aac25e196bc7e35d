import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { LidarMatcher } from "@/services/LidarMatcher";
import { expandHome } from "@/utils/helper";

export function registerMatchLidar(cli: CAC, baseLogger: Logger) {
  cli
    .command("match-lidar <image> <lidar>", "找出時間最接近影像的光達檔 (lidar/paired/*.csv)")
    .action(async (image: string, lidar: string) => {
      const logger = baseLogger.extend("match-lidar");
      const matcher = new LidarMatcher(new FileSystemScannerDefault());
      const result = await matcher.findMatchingLidarFile(
        expandHome(image),
        expandHome(lidar)
      );
      if (!result.ok) {
        logger.error({ error: result.error })`${result.error.message}`;
        process.exit(1);
      }
      logger.info({
        deltaSeconds: result.value.deltaMs / 1000,
      })`最接近的光達檔 ${result.value.lidarPath}`;
      console.log(result.value.lidarPath);
    });
}
