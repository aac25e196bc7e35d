import type { Result } from "~shared/utils/Result";

export type ArchiveError =
  | { type: "HTTP_ERROR"; url: string; status: number; message: string }
  | { type: "NETWORK_ERROR"; url: string; message: string }
  | { type: "TIMEOUT"; url: string; message: string }
  | { type: "TOO_MANY_REDIRECTS"; url: string; message: string }
  | { type: "WRITE_FAILED"; url: string; message: string };

export interface ArchiveClient {
  /** 資料夾是否存在；只看狀態碼，不跟隨轉址 */
  exists(url: string): Promise<boolean>;

  /** 取得文字內容（例如資料夾的 HTML 列表） */
  fetchText(url: string): Promise<Result<string, ArchiveError>>;

  /** 下載到指定路徑；先寫入 .part 再改名 */
  download(url: string, destPath: string): Promise<Result<void, ArchiveError>>;
}
