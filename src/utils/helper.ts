import { rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** 檔案存在且大小不為 0 */
export async function fileNonEmpty(p: string) {
  try {
    const s = await stat(p);
    return s.isFile() && s.size > 0;
  } catch {
    return false;
  }
}

/** 刪除檔案，不存在時忽略；回傳是否真的刪除 */
export async function wipe(p: string) {
  if (!(await exists(p))) return false;
  await rm(p, { force: true });
  return true;
}
