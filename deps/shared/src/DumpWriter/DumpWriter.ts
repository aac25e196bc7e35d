export interface DumpWriter {
  /**
   * 將資料以 JSON 輸出成報告檔。
   * 成功回傳檔案路徑；寫入失敗只記錄錯誤，回傳 undefined。
   */
  dump(name: string, data: unknown): Promise<string | undefined>;
}
