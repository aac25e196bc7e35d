import path from "node:path";

import {
  imageExtensions,
  lidarTypes,
  productTypes,
  sites,
} from "@/constants";
import type { LidarType, ProductType, Site } from "@/types";

export function isProductType(value: string): value is ProductType {
  return productTypes.some((type) => type === value);
}

export function isLidarType(value: string): value is LidarType {
  return lidarTypes.some((type) => type === value);
}

export function isSite(value: string): value is Site {
  return sites.some((site) => site === value);
}

/** 例如 .tif；保留原本大小寫 */
export function fileExtension(fileName: string) {
  return path.extname(fileName);
}

export function hasImageExtension(fileName: string) {
  const ext = fileExtension(fileName).toLowerCase();
  return imageExtensions.some((e) => e === ext);
}

export function isDEM(fileName: string) {
  return fileName.endsWith("_DEM.tif");
}

/**
 * 資料檔對應的 XML 說明檔。
 * X_DEM.tif 與 X_DEM.tfw 共用 X.xml，其他檔案則是直接加上 .xml。
 */
export function xmlFileOf(fileName: string) {
  if (fileName.length >= 8 && fileName.slice(-7, -4) === "DEM") {
    return fileName.slice(0, -8) + ".xml";
  }
  return fileName + ".xml";
}

/** XML 可能描述的資料檔（一般檔案與 DEM 兩種命名） */
export function imageFilesOfXml(xmlFile: string): string[] {
  if (fileExtension(xmlFile) !== ".xml") {
    throw new Error(`不是 XML 檔案: ${xmlFile}`);
  }
  const base = xmlFile.slice(0, -4);
  return [base, `${base}_DEM.tif`];
}

export function tfwFileOf(fileName: string) {
  return fileName.slice(0, -4) + ".tfw";
}

const frameNumberPatterns = [
  // 2009_10_16_<several digits>.JPG
  /^.*?(\d+_\d+_\d+_)(\d+)(\.JPG)/i,
  // DMS_1000109_03939_20091016_23310503_V02.tif
  /^.*?(DMS_\d+_)(\d+)(\w+\.tif)/i,
  // IODMS3_20111018_14295436_00347_DEM.tif
  /^.*?(IODMS[a-zA-Z0-9]*?_\d+_\d+_)(\d+)(\w+DEM\.tif)/i,
  // ILVIS2_AQ2015_0929_R1605_060226.TXT
  /^.*?(ILVIS.*?_)(\d+)(.TXT)/i,
  // ILATM1B_20091016_193033.atm4cT3.qi / ILATM1B_20160713_195419.ATM5BT5.h5
  /^.*?(ILATM\w+_\d+_)(\d+)\.\w+\.(h5|qi)/i,
];

/**
 * 由各產品的檔名取出 frame 編號：原始影像、正射影像、DEM、LVIS、ATM。
 * 不適用於 .tsai 相機檔。
 */
export function parseFrameNumber(fileName: string): number | undefined {
  for (const pattern of frameNumberPatterns) {
    const match = pattern.exec(fileName);
    if (match) return parseInt(match[2], 10);
  }
  return undefined;
}

/**
 * 找出檔名中第一個 5 位數的段落。日期與時間的位數較多，不會誤判。
 * 用於重新命名過的影像與相機檔。
 */
export function parseFiveDigitFrame(filePath: string): number | undefined {
  const parts = path.basename(filePath).replaceAll(".", "_").split("_");
  const part = parts.find((p) => /^\d{5}$/.test(p));
  return part === undefined ? undefined : parseInt(part, 10);
}

/** 由檔名判斷光達資料來源 */
export function lidarTypeOfFile(fileName: string): LidarType | undefined {
  if (/^ILVIS/i.test(fileName)) return "lvis";
  if (/^ILATM1B.*\.qi$/i.test(fileName)) return "atm1";
  if (/^ILATM1B.*\.h5$/i.test(fileName)) return "atm2";
  return undefined;
}
