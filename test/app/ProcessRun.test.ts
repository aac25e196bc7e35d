import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";

import { toRunOptions } from "@/app/ProcessRun";

describe("toRunOptions", () => {
  test("命令列字串轉成數字並補上預設值", () => {
    expect(
      toRunOptions({
        startFrame: "100",
        stereoAlgorithm: "2",
        bundleLength: 4,
        maxDisplacement: "",
        numProcesses: 2,
        south: true,
        orthoFolder: "~/ortho",
      })
    ).toEqual({
      startFrame: 100,
      stopFrame: undefined,
      bundleLength: 4,
      imageStereoInterval: undefined,
      orthoFolder: path.join(os.homedir(), "ortho"),
      stereoAlgorithm: 2,
      numThreads: undefined,
      solveIntrinsics: false,
      isSouth: true,
      maxDisplacement: 20,
    });
  });
});
