import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { afterAll, beforeEach, describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  BATCH_TOOL,
  ORBITVIZ_TOOL,
  type ImageCameraPair,
  type RunPlan,
  RunExecutor,
  orbitvizArgs,
  planBatches,
  watchQuitKey,
} from "@/services/Run";
import { ToolRunnerFake } from "~test/fakes/ToolRunnerFake";

const tmpDir = "test/tmp/run-executor";

const pairs: ImageCameraPair[] = [1, 2, 3, 4].map((frame) => ({
  image: `img${frame}.tif`,
  camera: `img${frame}.tsai`,
  frame,
}));

function buildPlan(): RunPlan {
  return {
    pairs,
    interval: 1,
    breaks: [],
    extraArgs: ["--stereo-image-interval", "1"],
    batches: planBatches(pairs, { bundleLength: 2, interval: 1, breaks: [] }, tmpDir),
  };
}

let runner: ToolRunnerFake;
let executor: RunExecutor;

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(tmpDir, { recursive: true });
  runner = new ToolRunnerFake();
  executor = new RunExecutor({ runner, logger: buildTestLogger() });
});

afterAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("RunExecutor.execute", () => {
  test("單一批次失敗不影響其他批次", async () => {
    runner.failCall(1);
    const summary = await executor.execute(buildPlan(), "lidar", { numProcesses: 1 });
    expect(summary.total).toBe(3);
    expect(summary.succeeded).toEqual([0, 2]);
    expect(summary.failed.map((f) => [f.index, f.error.type])).toEqual([
      [1, "TOOL_FAILED"],
    ]);
    expect(summary.notStarted).toEqual([]);
    expect(runner.calls.map((c) => c.command)).toEqual([
      BATCH_TOOL,
      BATCH_TOOL,
      BATCH_TOOL,
    ]);
    expect(runner.calls[0].args.slice(0, 4)).toEqual([
      "--lidar-overlay",
      "--lidar-folder",
      "lidar",
      join(tmpDir, "batch_1_2"),
    ]);
  });

  test("中止後不再開始新的批次", async () => {
    const controller = new AbortController();
    runner.setOnRun(() => controller.abort());
    const summary = await executor.execute(buildPlan(), "lidar", {
      numProcesses: 1,
      signal: controller.signal,
    });
    expect(summary.succeeded).toEqual([]);
    expect(summary.failed.map((f) => [f.index, f.error.type])).toEqual([
      [0, "TOOL_ABORTED"],
    ]);
    expect(summary.notStarted).toEqual([1, 2]);
  });
});

describe("RunExecutor.logBatches", () => {
  test("每個批次一行命令", async () => {
    const logPath = await executor.logBatches(buildPlan(), "lidar", tmpDir);
    expect(logPath).toBe(join(tmpDir, "batch_commands_log.txt"));
    const lines = (await readFile(logPath, "utf8")).trimEnd().split("\n");
    expect(lines.length).toBe(3);
    expect(lines[0]).toBe(
      `0: --lidar-overlay --lidar-folder lidar ${join(tmpDir, "batch_1_2")} img1.tif img2.tif img1.tsai img2.tsai --stereo-image-interval 1`
    );
    expect(runner.calls).toEqual([]);
  });
});

describe("RunExecutor.writeCameraMap", () => {
  test("呼叫 orbitviz，已有 KML 時略過", async () => {
    const kmlPath = join(tmpDir, "cameras_in.kml");
    const first = await executor.writeCameraMap(pairs.slice(0, 1), tmpDir);
    expectOk(first);
    expect(first.value).toBe(kmlPath);
    expect(runner.calls).toEqual([
      { command: ORBITVIZ_TOOL, args: orbitvizArgs(pairs.slice(0, 1), kmlPath) },
    ]);

    await writeFile(kmlPath, "<kml/>");
    const second = await executor.writeCameraMap(pairs, tmpDir);
    expectOk(second);
    expect(second.value).toBeUndefined();
    expect(runner.calls.length).toBe(1);
  });
});

describe("orbitvizArgs", () => {
  test("影像與相機檔成對排列", () => {
    expect(orbitvizArgs(pairs.slice(0, 2), "cams.kml")).toEqual([
      "--hide-labels",
      "-t",
      "nadirpinhole",
      "-r",
      "wgs84",
      "-o",
      "cams.kml",
      "img1.tif",
      "img1.tsai",
      "img2.tif",
      "img2.tsai",
    ]);
  });
});

describe("watchQuitKey", () => {
  test("讀到 q 時呼叫 onQuit", async () => {
    const input = new PassThrough();
    let quits = 0;
    const quit = new Promise<void>((resolve) => {
      const stop = watchQuitKey(input, () => {
        quits++;
        stop();
        resolve();
      });
    });
    input.write("x\n");
    input.write(" Q \n");
    await quit;
    expect(quits).toBe(1);
  });
});
