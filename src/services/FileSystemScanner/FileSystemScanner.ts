import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設為 true */
  recursive?: boolean;
  /** 副檔名白名單，不分大小寫 */
  allowExts?: readonly string[];
  /** 檔名包含任一字串即排除 */
  excludes?: readonly string[];
};

export interface FileSystemScanner {
  /** 回傳排序過的完整路徑 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
