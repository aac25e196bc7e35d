import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";
import { fileExtension, xmlFileOf } from "@/utils/fileNames";

import { parseWorldFile } from "./WorldFile";

export type MetadataError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "NO_LATITUDE"; message: string };

const latitudeRe = /^.*?<PointLatitude>(.*?)</i;
const fileNameRe = /^.*?<DistributedFileName>(.*?)</i;
const checksumRe = /^.*?<Checksum>(\w+)(\||<)/i;

/** 取出第一個 PointLatitude */
export function parseLatitude(xmlText: string): number | undefined {
  for (const line of xmlText.split(/\r?\n/)) {
    const match = latitudeRe.exec(line);
    if (!match) continue;
    const latitude = Number(match[1]);
    return Number.isFinite(latitude) ? latitude : undefined;
  }
  return undefined;
}

export async function readLatitude(
  xmlPath: string
): Promise<Result<number, MetadataError>> {
  let text: string;
  try {
    text = await readFile(xmlPath, "utf8");
  } catch {
    return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${xmlPath}` });
  }
  const latitude = parseLatitude(text);
  if (latitude === undefined) {
    return err({
      type: "NO_LATITUDE",
      message: `無法從 ${xmlPath} 解析緯度`,
    });
  }
  return ok(latitude);
}

/** 南半球需要負緯度，北半球需要正緯度 */
export function isGoodLatitude(latitude: number, isSouth: boolean) {
  return isSouth ? latitude < 0 : latitude > 0;
}

/**
 * 從 XML 找出檔案應有的 checksum。
 * XML 可能描述多個檔案：若有 DistributedFileName，取與 baseName 相符者；
 * 否則取第一個 checksum。
 */
export function parseExpectedChecksum(xmlText: string, baseName: string) {
  let expected = "";
  let count = 0;
  let currentFile = "";
  for (const line of xmlText.split(/\r?\n/)) {
    const fileMatch = fileNameRe.exec(line);
    if (fileMatch) currentFile = fileMatch[1];

    const checksumMatch = checksumRe.exec(line);
    if (!checksumMatch) continue;
    count++;
    if (currentFile !== "") {
      if (currentFile === baseName) expected = checksumMatch[1];
    } else if (count === 1) {
      expected = checksumMatch[1];
    }
  }
  return expected;
}

export async function md5OfFile(filePath: string) {
  const hash = createHash("md5");
  await pipeline(createReadStream(filePath), hash);
  return hash.digest("hex");
}

export type ChecksumCheck =
  | { valid: true; checksum: string }
  | { valid: false; reason: string; actual?: string; expected?: string };

/** 正射影像、DEM 與 tfw 檔案可以用 XML 內的 checksum 驗證 */
export async function checkChecksum(filePath: string): Promise<ChecksumCheck> {
  if (!(await exists(filePath))) {
    return { valid: false, reason: "資料檔不存在" };
  }
  const xmlPath = xmlFileOf(filePath);
  let xmlText: string;
  try {
    xmlText = await readFile(xmlPath, "utf8");
  } catch {
    return { valid: false, reason: `XML 不存在: ${xmlPath}` };
  }

  const expected = parseExpectedChecksum(xmlText, path.basename(filePath));
  const actual = await md5OfFile(filePath);
  if (expected === "" || actual !== expected) {
    return { valid: false, reason: "checksum 不符", actual, expected };
  }
  return { valid: true, checksum: actual };
}

export async function hasValidChecksum(filePath: string) {
  return (await checkChecksum(filePath)).valid;
}

/** tfw 需要 checksum 正確，並且至少有 6 行數字 */
export async function isValidTfw(filePath: string) {
  if (fileExtension(filePath) !== ".tfw") return false;
  if (!(await hasValidChecksum(filePath))) return false;
  const text = await readFile(filePath, "utf8");
  return parseWorldFile(text) !== undefined;
}
