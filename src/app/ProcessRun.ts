import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { getAppConfig } from "@/config";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { ImageInspectorExifTool } from "@/services/ImageInspector";
import {
  type RunOptions,
  RunExecutor,
  RunPlanner,
  ToolRunnerExeca,
  batchArgs,
  watchQuitKey,
} from "@/services/Run";
import { exists, expandHome } from "@/utils/helper";

type RawRunOptions = {
  startFrame?: number | string;
  stopFrame?: number | string;
  south?: boolean;
  stereoAlgorithm: number | string;
  bundleLength: number | string;
  imageStereoInterval?: number | string;
  solveIntrinsics?: boolean;
  maxDisplacement: number | string;
  numProcesses: number | string;
  numThreads?: number | string;
  interactive?: boolean;
  dryRun?: boolean;
  logBatches?: boolean;
  orthoFolder?: string;
};

function toNumber(value: number | string | undefined) {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

export function toRunOptions(raw: RawRunOptions): RunOptions {
  return {
    startFrame: toNumber(raw.startFrame),
    stopFrame: toNumber(raw.stopFrame),
    bundleLength: toNumber(raw.bundleLength) ?? 2,
    imageStereoInterval: toNumber(raw.imageStereoInterval),
    orthoFolder: raw.orthoFolder ? expandHome(raw.orthoFolder) : undefined,
    stereoAlgorithm: toNumber(raw.stereoAlgorithm) ?? 1,
    numThreads: toNumber(raw.numThreads),
    solveIntrinsics: raw.solveIntrinsics ?? false,
    isSouth: raw.south ?? false,
    maxDisplacement: toNumber(raw.maxDisplacement) ?? 20,
  };
}

export function registerProcessRun(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "process-run <images> <cameras> <lidar> <output>",
      "將整趟飛行分成重疊的批次，並行執行批次處理工具"
    )
    .option("--start-frame <frame>", "起始 frame")
    .option("--stop-frame <frame>", "結束 frame")
    .option("--south", "南半球的影像必須設定")
    .option("--stereo-algorithm <n>", "SGM 立體匹配演算法", { default: 1 })
    .option("--bundle-length <n>", "一次做 bundle adjustment 的影像數", {
      default: 2,
    })
    .option("--image-stereo-interval <n>", "立體像對相隔的 frame 數，預設自動計算")
    .option("--solve-intrinsics", "一併求解內部參數")
    .option("--max-displacement <n>", "pc_align 的最大位移", { default: 20 })
    .option("--num-processes <n>", "同時執行的批次數", { default: 1 })
    .option("--num-threads <n>", "每個批次的執行緒數")
    .option("--interactive", "輸入 q 中止所有批次")
    .option("--dry-run", "只規劃，不執行")
    .option("--log-batches", "只把批次命令寫到記錄檔")
    .option("--ortho-folder <folder>", "以正射影像計算間隔與斷點")
    .action(
      async (
        images: string,
        cameras: string,
        lidar: string,
        output: string,
        raw: RawRunOptions
      ) => {
        const logger = baseLogger.extend("process-run");
        const config = getAppConfig();
        const folders = {
          images: expandHome(images),
          cameras: expandHome(cameras),
          lidar: expandHome(lidar),
          output: expandHome(output),
        };
        for (const folder of [folders.images, folders.cameras, folders.lidar]) {
          if (!(await exists(folder))) {
            logger.error()`輸入資料夾不存在: ${folder}`;
            process.exit(1);
          }
        }
        await mkdir(folders.output, { recursive: true });

        const options = toRunOptions(raw);
        const inspector = new ImageInspectorExifTool();
        try {
          const planner = new RunPlanner({
            scanner: new FileSystemScannerDefault(),
            inspector,
            logger,
          });
          const planned = await planner.plan(folders, options);
          if (!planned.ok) {
            logger.error({ error: planned.error })`${planned.error.message}`;
            process.exitCode = 1;
            return;
          }
          const plan = planned.value;
          const reporter = new DumpWriterDefault(logger, config.DUMP_DIR);
          await reporter.dump(`process-run-${path.basename(folders.output)}`, {
            interval: plan.interval,
            breaks: plan.breaks,
            batches: plan.batches.map((b) => ({
              index: b.index,
              outputFolder: b.outputFolder,
              frames: b.pairs.map((p) => p.frame),
            })),
          });

          const executor = new RunExecutor({
            runner: new ToolRunnerExeca(logger),
            logger,
          });
          if (raw.logBatches) {
            await executor.logBatches(plan, folders.lidar, folders.output);
            return;
          }
          if (raw.dryRun) {
            for (const batch of plan.batches) {
              logger.info({
                emoji: "📋",
              })`${batch.index}: ${batchArgs(batch, folders.lidar, plan.extraArgs).join(" ")}`;
            }
            return;
          }

          const kml = await executor.writeCameraMap(plan.pairs, folders.output);
          if (!kml.ok) {
            logger.warn({ error: kml.error })`無法產生相機位置 KML`;
          }

          const controller = new AbortController();
          const stopWatching = raw.interactive
            ? watchQuitKey(process.stdin, () => {
                logger.warn()`收到 q，中止剩餘的批次`;
                controller.abort();
              })
            : undefined;
          if (stopWatching) logger.info()`輸入 q 並按 Enter 可中止`;

          const numProcesses = toNumber(raw.numProcesses) ?? 1;
          logger.info({
            event: "start",
          })`以 ${numProcesses} 個程序執行 ${plan.batches.length} 個批次`;
          const summary = await executor.execute(plan, folders.lidar, {
            numProcesses,
            signal: controller.signal,
          });
          stopWatching?.();

          await reporter.dump(`process-run-${path.basename(folders.output)}-summary`, summary);
          if (summary.failed.length > 0 || summary.notStarted.length > 0) {
            logger.warn({
              failed: summary.failed.map((f) => f.index),
              notStarted: summary.notStarted,
            })`${summary.failed.length} 個批次失敗，${summary.notStarted.length} 個未執行`;
            process.exitCode = 1;
          } else {
            logger.info({ event: "done" })`全部 ${summary.total} 個批次完成`;
          }
        } finally {
          await dispose(inspector);
        }
      }
    );
}
