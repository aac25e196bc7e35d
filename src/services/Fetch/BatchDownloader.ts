import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { MAX_IN_ONE_CALL } from "@/constants";
import type { ArchiveClient, ArchiveError } from "@/services/ArchiveClient";
import { fileNonEmpty } from "@/utils/helper";
import { runPool } from "@/utils/pool";

export type DownloadFailure = {
  filePath: string;
  url: string;
  error: ArchiveError;
};

export type BatchDownloadSummary = {
  requested: number;
  skipped: number;
  downloaded: number;
  batches: number;
  failures: DownloadFailure[];
};

export type BatchDownloadError = {
  type: "LENGTH_MISMATCH";
  message: string;
};

/**
 * 下載尚未存在（或為空檔）的檔案，每 batchSize 個一批。
 * 個別失敗只記錄，留給後續驗證處理。
 */
export class BatchDownloader {
  private readonly client: ArchiveClient;
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly concurrency: number;

  constructor(deps: {
    client: ArchiveClient;
    logger: Logger;
    batchSize?: number;
    concurrency?: number;
  }) {
    this.client = deps.client;
    this.logger = deps.logger.extend("BatchDownloader");
    this.batchSize = deps.batchSize ?? MAX_IN_ONE_CALL;
    this.concurrency = deps.concurrency ?? 4;
  }

  async fetchAll(
    files: readonly string[],
    urls: readonly string[],
    options: { dryRun?: boolean } = {}
  ): Promise<Result<BatchDownloadSummary, BatchDownloadError>> {
    if (files.length !== urls.length) {
      return err({
        type: "LENGTH_MISMATCH",
        message: `檔案數 ${files.length} 與網址數 ${urls.length} 不同`,
      });
    }

    const summary: BatchDownloadSummary = {
      requested: files.length,
      skipped: 0,
      downloaded: 0,
      batches: 0,
      failures: [],
    };

    const pending: { filePath: string; url: string }[] = [];
    for (const [i, filePath] of files.entries()) {
      if (await fileNonEmpty(filePath)) {
        summary.skipped++;
        continue;
      }
      pending.push({ filePath, url: urls[i] });
    }

    for (let i = 0; i < pending.length; i += this.batchSize) {
      const batch = pending.slice(i, i + this.batchSize);
      summary.batches++;
      this.logger.info({
        emoji: "📦",
        urls: batch.map((b) => b.url),
      })`第 ${summary.batches} 批：${batch.length} 個檔案`;
      if (options.dryRun) continue;

      const results = await runPool(batch, this.concurrency, async (item) => {
        const res = await this.client.download(item.url, item.filePath);
        if (!res.ok) {
          this.logger.warn({ error: res.error })`下載失敗 ${item.url}`;
          summary.failures.push({ ...item, error: res.error });
          return false;
        }
        return true;
      });
      summary.downloaded += results.filter(
        (r) => r.status === "fulfilled" && r.value
      ).length;
    }

    this.logger.info({
      event: "done",
    })`下載完成：新下載 ${summary.downloaded}，已存在 ${summary.skipped}，失敗 ${summary.failures.length}`;
    return ok(summary);
  }
}
