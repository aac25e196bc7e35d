import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { getAppConfig } from "@/config";
import { FetchValidator } from "@/services/Fetch";
import { ImageInspectorExifTool } from "@/services/ImageInspector";
import { FlightVerifyService, isComplete } from "@/services/Verify";
import { isProductType, isSite } from "@/utils/fileNames";
import { expandHome } from "@/utils/helper";

type VerifyOptions = {
  type: string;
  site?: string;
  startFrame?: number | string;
  stopFrame?: number | string;
};

function toFrame(value: number | string | undefined) {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isInteger(n) ? n : undefined;
}

export function registerVerifyFlight(cli: CAC, baseLogger: Logger) {
  cli
    .command("verify <output>", "依索引檢查已下載的資料夾，不連線、不刪除")
    .option("--type <type>", "image、ortho、dem、lidar", { default: "image" })
    .option("--site <site>", "AN 或 GR，用來檢查 XML 的緯度")
    .option("--start-frame <frame>", "起始 frame，預設為索引中的全部")
    .option("--stop-frame <frame>", "結束 frame")
    .action(async (output: string, options: VerifyOptions) => {
      const logger = baseLogger.extend("verify", { emoji: "🔎" });
      const type = options.type === "lidar" ? "lvis" : options.type;
      if (!isProductType(type)) {
        logger.error()`未知的 type: ${options.type}`;
        process.exit(1);
      }
      const site = options.site?.toUpperCase();
      if (site === undefined || !isSite(site)) {
        logger.error()`必須指定 --site (AN 或 GR)`;
        process.exit(1);
      }

      const config = getAppConfig();
      const outputFolder = path.resolve(expandHome(output));
      const inspector = new ImageInspectorExifTool();
      const service = new FlightVerifyService({
        validator: new FetchValidator({ inspector, logger }),
        logger,
      });

      try {
        const startFrame = toFrame(options.startFrame);
        const result = await service.verify(outputFolder, {
          type,
          isSouth: site === "AN",
          startFrame,
          stopFrame: toFrame(options.stopFrame) ?? startFrame,
        });
        if (!result.ok) {
          logger.error({ error: result.error })`${result.error.message}`;
          process.exitCode = 1;
          return;
        }
        const report = result.value;
        for (const [kind, counts] of Object.entries(report.counts)) {
          if (counts.expected === 0) continue;
          logger.info({
            kind,
          })`${kind}: 預期 ${counts.expected}，存在 ${counts.present}，有效 ${counts.valid}，缺少 ${counts.missing}，無效 ${counts.invalid}`;
        }

        const reporter = new DumpWriterDefault(logger, config.DUMP_DIR);
        await reporter.dump(`verify-${path.basename(outputFolder)}-${report.type}`, report);

        if (!isComplete(report)) process.exitCode = 1;
      } finally {
        await dispose(inspector);
      }
    });
}
