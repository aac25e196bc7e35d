import { appendFile, mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";

import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import { BATCH_COMMAND_LOG_FILE } from "@/constants";
import { exists } from "@/utils/helper";
import { runPool } from "@/utils/pool";

import { type ImageCameraPair, type RunBatch, type RunPlan, batchArgs } from "./RunPlanner";
import type { ToolError, ToolRunner } from "./ToolRunner";

export const BATCH_TOOL = "process_icebridge_batch";
export const ORBITVIZ_TOOL = "orbitviz";

export type RunSummary = {
  total: number;
  succeeded: number[];
  failed: { index: number; outputFolder: string; error: ToolError }[];
  /** 中止後沒有開始的批次 */
  notStarted: number[];
};

export function orbitvizArgs(pairs: readonly ImageCameraPair[], kmlPath: string) {
  return [
    "--hide-labels",
    "-t",
    "nadirpinhole",
    "-r",
    "wgs84",
    "-o",
    kmlPath,
    ...pairs.flatMap((p) => [p.image, p.camera]),
  ];
}

/** 在輸入串流讀到 quitKey 時呼叫 onQuit；回傳停止監聽的函式 */
export function watchQuitKey(
  input: NodeJS.ReadableStream,
  onQuit: () => void,
  quitKey = "q"
) {
  const rl = createInterface({ input, terminal: false });
  rl.on("line", (line) => {
    if (line.trim().toLowerCase() === quitKey) onQuit();
  });
  return () => rl.close();
}

export class RunExecutor {
  private readonly runner: ToolRunner;
  private readonly logger: Logger;

  constructor(deps: { runner: ToolRunner; logger: Logger }) {
    this.runner = deps.runner;
    this.logger = deps.logger.extend("RunExecutor");
  }

  /** 產生相機初始位置的 KML；已存在就略過 */
  async writeCameraMap(
    pairs: readonly ImageCameraPair[],
    outputFolder: string
  ): Promise<Result<string | undefined, ToolError>> {
    const kmlPath = path.join(outputFolder, "cameras_in.kml");
    if (await exists(kmlPath)) {
      this.logger.info()`已有 ${kmlPath}，略過 orbitviz`;
      return ok(undefined);
    }
    await mkdir(outputFolder, { recursive: true });
    const res = await this.runner.run(ORBITVIZ_TOOL, orbitvizArgs(pairs, kmlPath));
    if (!res.ok) return res;
    return ok(kmlPath);
  }

  /** 只把每個批次的命令寫到記錄檔，不執行 */
  async logBatches(plan: RunPlan, lidarFolder: string, outputFolder: string) {
    const logPath = path.join(outputFolder, BATCH_COMMAND_LOG_FILE);
    await mkdir(outputFolder, { recursive: true });
    await rm(logPath, { force: true });
    for (const batch of plan.batches) {
      const args = batchArgs(batch, lidarFolder, plan.extraArgs);
      await appendFile(logPath, `${batch.index}: ${args.join(" ")}\n`);
    }
    this.logger.info({ emoji: "📝" })`已寫入 ${plan.batches.length} 個批次命令到 ${logPath}`;
    return logPath;
  }

  /**
   * 以 numProcesses 個併發執行所有批次。單一批次失敗不影響其他批次；
   * signal 中止時停止排入新批次並中止執行中的批次。
   */
  async execute(
    plan: RunPlan,
    lidarFolder: string,
    options: { numProcesses: number; signal?: AbortSignal }
  ): Promise<RunSummary> {
    const summary: RunSummary = {
      total: plan.batches.length,
      succeeded: [],
      failed: [],
      notStarted: [],
    };
    const started = new Set<number>();

    const runBatch = async (batch: RunBatch) => {
      started.add(batch.index);
      this.logger.info({
        emoji: "🚀",
      })`開始批次 ${batch.index}: frame ${batch.firstFrame} ~ ${batch.lastFrame}`;
      await mkdir(batch.outputFolder, { recursive: true });
      const res = await this.runner.run(
        BATCH_TOOL,
        batchArgs(batch, lidarFolder, plan.extraArgs),
        { signal: options.signal }
      );
      if (!res.ok) {
        this.logger.error({ error: res.error })`批次 ${batch.index} 失敗`;
        summary.failed.push({
          index: batch.index,
          outputFolder: batch.outputFolder,
          error: res.error,
        });
        return;
      }
      this.logger.info({ event: "done" })`批次 ${batch.index} 完成`;
      summary.succeeded.push(batch.index);
    };

    const results = await runPool(
      plan.batches,
      options.numProcesses,
      runBatch,
      options.signal
    );
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.error({ error: result.reason })`批次執行時發生錯誤`;
      }
    }
    summary.notStarted = plan.batches
      .map((b) => b.index)
      .filter((i) => !started.has(i));
    summary.succeeded.sort((a, b) => a - b);
    summary.failed.sort((a, b) => a.index - b.index);
    return summary;
  }
}
