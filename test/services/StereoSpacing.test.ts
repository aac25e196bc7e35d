import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { LoggerConsole, type LogRecord } from "~shared/Logger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  type OrthoFootprint,
  boxArea,
  computeImageSpacing,
  intersect,
  loadOrthoFootprints,
} from "@/services/Run";
import { ImageInspectorFake } from "~test/fakes/ImageInspectorFake";

const tmpDir = "test/tmp/stereo-spacing";

/** 沿 x 方向排列、邊長 16 的外框 */
function strip(offsets: number[]): OrthoFootprint[] {
  return offsets.map((x, i) => ({
    filePath: `ortho_${i + 1}.tif`,
    frame: i + 1,
    bounds: { minX: x, maxX: x + 16, minY: 0, maxY: 16 },
  }));
}

beforeAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(tmpDir, { recursive: true });
});

afterAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("外框", () => {
  test("交集與面積", () => {
    const a = { minX: 0, maxX: 10, minY: 0, maxY: 10 };
    const b = { minX: 5, maxX: 15, minY: 5, maxY: 15 };
    expect(intersect(a, b)).toEqual({ minX: 5, maxX: 10, minY: 5, maxY: 10 });
    expect(boxArea(intersect(a, b))).toBe(25);
    expect(boxArea(intersect(a, { minX: 20, maxX: 30, minY: 0, maxY: 10 }))).toBe(0);
  });
});

describe("computeImageSpacing", () => {
  test("增加間隔直到平均重疊率不超過上限", () => {
    // 間隔 1 的重疊率 0.875，間隔 2 為 0.75
    const res = computeImageSpacing(strip([0, 2, 4, 6, 8]));
    expectOk(res);
    expect(res.value).toEqual({ interval: 2, breaks: [] });
  });

  test("記錄與下一張沒有重疊的 frame", () => {
    const res = computeImageSpacing(strip([0, 8, 100, 108]));
    expectOk(res);
    expect(res.value).toEqual({ interval: 1, breaks: [2] });
  });

  test("有 logger 時記錄斷點與結果", () => {
    const records: LogRecord[] = [];
    const logger = new LoggerConsole("info", ["spacing"], {}, {}, [
      { write: (record) => records.push(record), [Symbol.asyncDispose]: async () => {} },
    ]);
    const res = computeImageSpacing(strip([0, 8, 100, 108]), logger);
    expectOk(res);
    expect(records.map((r) => r.msg)).toEqual([
      "frame 2 之後沒有重疊",
      "自動計算的立體像對間隔 1",
    ]);
  });

  test("影像太少時失敗", () => {
    const res = computeImageSpacing(strip([0, 0]));
    expectErr(res);
    expect(res.error.type).toBe("TOO_FEW_IMAGES");
  });
});

describe("loadOrthoFootprints", () => {
  test("只讀取 .tif，排除縮圖與灰階檔", async () => {
    const folder = join(tmpDir, "ortho");
    await mkdir(folder, { recursive: true });
    const names = [
      "DMS_1281706_00002_20111018_14295436_V02.tif",
      "DMS_1281706_00001_20111018_14295435_V02.tif",
    ];
    const inspector = new ImageInspectorFake();
    for (const [i, name] of names.entries()) {
      await writeFile(join(folder, name), "tif");
      inspector.setImage(join(folder, name), {
        minX: i,
        maxX: i + 10,
        minY: 0,
        maxY: 10,
      });
    }
    await writeFile(join(folder, "DMS_1281706_00001_sub.tif"), "tif");
    await writeFile(join(folder, `${names[0]}_gray.tif`), "tif");
    await writeFile(join(folder, "notes.txt"), "txt");

    const res = await loadOrthoFootprints(folder, {
      scanner: new FileSystemScannerDefault(),
      inspector,
    });
    expectOk(res);
    expect(res.value.map((f) => f.frame)).toEqual([1, 2]);
    expect(res.value[0].bounds.minX).toBe(1);
  });

  test("沒有外框的正射影像算錯誤", async () => {
    const folder = join(tmpDir, "no-bounds");
    await mkdir(folder, { recursive: true });
    const name = "DMS_1281706_00001_20111018_14295435_V02.tif";
    await writeFile(join(folder, name), "tif");
    const inspector = new ImageInspectorFake();
    inspector.setImage(join(folder, name));

    const res = await loadOrthoFootprints(folder, {
      scanner: new FileSystemScannerDefault(),
      inspector,
    });
    expectErr(res);
    expect(res.error.type).toBe("NO_FOOTPRINT");
  });
});
