import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const excludes = options?.excludes ?? [];
    const isRecursive = options?.recursive ?? true;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    try {
      const files = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          if (!d.isFile()) return false;
          if (excludes.some((x) => d.name.includes(x))) return false;
          if (allowExtsSet.size === 0) return true;
          return allowExtsSet.has(path.extname(d.name).toLowerCase());
        })
        .map((d) => path.join(d.parentPath, d.name))
        .sort();
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
