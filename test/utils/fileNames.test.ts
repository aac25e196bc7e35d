import { describe, expect, test } from "vitest";

import {
  hasImageExtension,
  imageFilesOfXml,
  isDEM,
  lidarTypeOfFile,
  parseFiveDigitFrame,
  parseFrameNumber,
  tfwFileOf,
  xmlFileOf,
} from "@/utils/fileNames";
import { parseDateTime, parseTimeStamps } from "@/utils/timeStamps";

describe("parseFrameNumber", () => {
  test.each([
    ["2009_10_16_00123.JPG", 123],
    ["DMS_1000109_03939_20091016_23310503_V02.tif", 3939],
    ["IODMS3_20111018_14295436_00347_DEM.tif", 347],
    ["ILVIS2_AQ2015_0929_R1605_060226.TXT", 60226],
    ["ILATM1B_20091016_193033.atm4cT3.qi", 193033],
    ["ILATM1B_20160713_195419.ATM5BT5.h5", 195419],
  ])("%s → %d", (fileName, frame) => {
    expect(parseFrameNumber(fileName)).toBe(frame);
  });

  test("無法辨識的檔名回傳 undefined", () => {
    expect(parseFrameNumber("readme.txt")).toBeUndefined();
  });
});

describe("檔名轉換", () => {
  test("DEM 與 tfw 共用去掉 _DEM 的 XML", () => {
    expect(xmlFileOf("IODMS3_20111018_14295436_00347_DEM.tif")).toBe(
      "IODMS3_20111018_14295436_00347.xml"
    );
    expect(xmlFileOf("IODMS3_20111018_14295436_00347_DEM.tfw")).toBe(
      "IODMS3_20111018_14295436_00347.xml"
    );
  });

  test("其他檔案直接加上 .xml", () => {
    expect(xmlFileOf("DMS_1000109_03939_20091016_23310503_V02.tif")).toBe(
      "DMS_1000109_03939_20091016_23310503_V02.tif.xml"
    );
  });

  test("XML 描述的檔案包含一般與 DEM 命名", () => {
    expect(imageFilesOfXml("/data/IODMS3_20111018_14295436_00347.xml")).toEqual([
      "/data/IODMS3_20111018_14295436_00347",
      "/data/IODMS3_20111018_14295436_00347_DEM.tif",
    ]);
    expect(() => imageFilesOfXml("a.tif")).toThrow();
  });

  test("tfw 與副檔名判斷", () => {
    expect(tfwFileOf("a_DEM.tif")).toBe("a_DEM.tfw");
    expect(isDEM("a_DEM.tif")).toBe(true);
    expect(isDEM("a.tif")).toBe(false);
    expect(hasImageExtension("photo.JPG")).toBe(true);
    expect(hasImageExtension("a.ntf")).toBe(true);
    expect(hasImageExtension("a.xml")).toBe(false);
  });

  test("5 位數的 frame 編號", () => {
    expect(parseFiveDigitFrame("/x/DMS_20111018_00347_14295436.tif")).toBe(347);
    expect(parseFiveDigitFrame("/x/cam_00347.tsai")).toBe(347);
    expect(parseFiveDigitFrame("/x/20111018.tif")).toBeUndefined();
  });

  test("由檔名判斷光達來源", () => {
    expect(lidarTypeOfFile("ILVIS2_AQ2015_0929_R1605_060226.TXT")).toBe("lvis");
    expect(lidarTypeOfFile("ILATM1B_20091016_193033.atm4cT3.qi")).toBe("atm1");
    expect(lidarTypeOfFile("ILATM1B_20160713_195419.ATM5BT5.h5")).toBe("atm2");
    expect(lidarTypeOfFile("DMS_1.tif")).toBeUndefined();
  });
});

describe("時間戳記", () => {
  test("第一個 8 位數是日期，下一段是時間", () => {
    expect(parseTimeStamps("/a/DMS_20111018_14295436_00347.tif")).toEqual([
      "20111018",
      "14295436",
    ]);
    expect(parseTimeStamps("lidar-20111018-142954.csv")).toEqual([
      "20111018",
      "142954",
    ]);
    expect(parseTimeStamps("no_stamp_here.tif")).toBeUndefined();
  });

  test("8 位數時間含百分之一秒", () => {
    expect(parseDateTime("20111018", "14295436")?.toISOString()).toBe(
      "2011-10-18T14:29:54.360Z"
    );
  });

  test("secondsFix 將 1-60 的秒數減一", () => {
    expect(parseDateTime("20111018", "142960", true)?.toISOString()).toBe(
      "2011-10-18T14:29:59.000Z"
    );
    expect(parseDateTime("20111018", "142960")).toBeUndefined();
  });

  test("超出範圍的日期或時間無效", () => {
    expect(parseDateTime("20110230", "120000")).toBeUndefined();
    expect(parseDateTime("20111018", "250000")).toBeUndefined();
    expect(parseDateTime("20111318", "120000")).toBeUndefined();
  });
});
