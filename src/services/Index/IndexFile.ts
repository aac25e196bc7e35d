import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FrameIndex, IndexEntry, ProductType } from "@/types";
import { isLidarType } from "@/utils/fileNames";

export type IndexFileError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_INDEX"; message: string };

/** 原始 HTML 清單的存放位置；光達共用同一份 */
export function indexHtmlPath(outputFolder: string, type: ProductType) {
  const name = isLidarType(type) ? "lidar" : type;
  return path.join(outputFolder, `${name}_index.html`);
}

export function indexCsvPath(outputFolder: string, type: ProductType) {
  return `${indexHtmlPath(outputFolder, type)}.csv`;
}

export function formatIndex(entries: Iterable<IndexEntry>) {
  return [...entries]
    .sort((a, b) => a.frame - b.frame)
    .map((e) => `${e.frame}, ${e.fileName}, ${e.folderUrl}\n`)
    .join("");
}

export async function writeIndexFile(
  filePath: string,
  entries: Iterable<IndexEntry>
) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatIndex(entries));
}

export function parseIndex(
  text: string,
  source: string
): Result<FrameIndex, IndexFileError> {
  const index: FrameIndex = new Map();
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  for (const [lineNo, line] of lines.entries()) {
    const parts = line.split(",").map((p) => p.trim());
    if (parts.length <= 2) {
      return err({
        type: "INVALID_INDEX",
        message: `${source} 第 ${lineNo + 1} 行格式錯誤: ${line}`,
      });
    }
    const frame = Number(parts[0]);
    if (!Number.isInteger(frame)) {
      return err({
        type: "INVALID_INDEX",
        message: `${source} 第 ${lineNo + 1} 行的 frame 不是整數: ${parts[0]}`,
      });
    }
    index.set(frame, {
      frame,
      fileName: parts[1],
      folderUrl: parts.slice(2).join(","),
    });
  }
  return ok(index);
}

export async function readIndexFile(
  filePath: string
): Promise<Result<FrameIndex, IndexFileError>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (e) {
    return err({
      type: "READ_FAILED",
      message: `讀取索引失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
    });
  }
  return parseIndex(text, filePath);
}
