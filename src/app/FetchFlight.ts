import type { CAC } from "cac";
import { isExists } from "date-fns";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { type Result, err, ok } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { EARTHDATA_HELP_URL, MAX_FETCH_ATTEMPTS } from "@/constants";
import {
  ArchiveClientHttp,
  credentialsFor,
  readNetrc,
} from "@/services/ArchiveClient";
import { ArchiveLayoutNsidc } from "@/services/ArchiveLayout";
import {
  BatchDownloader,
  type FetchAttempt,
  FetchValidator,
  FlightFetchService,
  retryUntilDone,
} from "@/services/Fetch";
import { FlightIndexServiceDefault } from "@/services/FlightIndex";
import { ImageInspectorExifTool } from "@/services/ImageInspector";
import {
  SpecialCaseStoreJson,
  flightKey,
  resolveAdjustments,
} from "@/services/SpecialCases";
import type { Flight, ProductType, Site } from "@/types";
import { isProductType, isSite } from "@/utils/fileNames";
import { expandHome } from "@/utils/helper";

export type RawFetchOptions = {
  yyyymmdd?: string | number;
  year?: string | number;
  month?: string | number;
  day?: string | number;
  site?: string;
  type?: string;
  startFrame?: string | number;
  stopFrame?: string | number;
  allFrames?: boolean;
  fetchFromNextDayAlso?: boolean;
  skipValidate?: boolean;
  dryRun?: boolean;
  refetchIndex?: boolean;
  maxNumToFetch?: string | number;
};

export type FetchOptions = {
  flight: Flight;
  type: ProductType;
  startFrame?: number;
  stopFrame?: number;
  allFrames: boolean;
  fetchNextDay: boolean;
  skipValidate: boolean;
  dryRun: boolean;
  refetchIndex: boolean;
  maxNumToFetch: number;
};

export type OptionError = { type: "INVALID_OPTIONS"; message: string };

function toInt(value: string | number | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isInteger(n) ? n : undefined;
}

/** 將命令列參數整理成抓取設定；--yyyymmdd 可帶一個字母的資料夾後綴 */
export function parseFetchOptions(
  raw: RawFetchOptions
): Result<FetchOptions, OptionError> {
  const invalid = (message: string) =>
    err<OptionError>({ type: "INVALID_OPTIONS", message });

  let year = toInt(raw.year);
  let month = toInt(raw.month);
  let day = toInt(raw.day);
  let ext = "";
  if (raw.yyyymmdd !== undefined) {
    const date = String(raw.yyyymmdd);
    const match = /^(\d{4})(\d{2})(\d{2})([a-z]?)$/.exec(date);
    if (!match) return invalid(`--yyyymmdd 格式錯誤: ${date}`);
    year = Number(match[1]);
    month = Number(match[2]);
    day = Number(match[3]);
    ext = match[4];
  }
  if (!year || !month || !day) {
    return invalid("必須指定年、月、日 (--yyyymmdd 或 --year --month --day)");
  }
  if (!isExists(year, month - 1, day)) {
    return invalid(`日期不存在: ${year}-${month}-${day}`);
  }

  let type = (raw.type ?? "image").toLowerCase();
  // 部分程式只認得特定的光達來源，從 lvis 開始找
  if (type === "lidar") type = "lvis";
  if (!isProductType(type)) {
    return invalid(`type 必須是 image、ortho、dem、lidar 或光達來源: ${raw.type}`);
  }

  let site: Site | undefined;
  if (raw.site !== undefined) {
    const upper = String(raw.site).toUpperCase();
    if (!isSite(upper)) return invalid(`site 必須是 AN 或 GR: ${raw.site}`);
    site = upper;
  }
  if (type === "image" && site === undefined) {
    return invalid("原始影像必須指定 --site (AN 或 GR)");
  }

  const startFrame = toInt(raw.startFrame);
  const stopFrame = toInt(raw.stopFrame) ?? startFrame;

  return ok({
    flight: { year, month, day, ext, site },
    type,
    startFrame,
    stopFrame,
    allFrames: raw.allFrames ?? false,
    fetchNextDay: raw.fetchFromNextDayAlso ?? false,
    skipValidate: raw.skipValidate ?? false,
    dryRun: raw.dryRun ?? false,
    refetchIndex: raw.refetchIndex ?? false,
    maxNumToFetch: toInt(raw.maxNumToFetch) ?? -1,
  });
}

export function registerFetchFlight(cli: CAC, baseLogger: Logger) {
  cli
    .command("fetch <output>", "從 NSIDC 下載一趟飛行的影像、正射影像、DEM 或光達資料")
    .option("--yyyymmdd <date>", "日期 YYYYMMDD，可加一個字母的資料夾後綴")
    .option("--year <year>", "年")
    .option("--month <month>", "月")
    .option("--day <day>", "日")
    .option("--site <site>", "AN 或 GR（原始影像必填）")
    .option("--type <type>", "image、ortho、dem、lidar", { default: "image" })
    .option("--start-frame <frame>", "起始 frame")
    .option("--stop-frame <frame>", "結束 frame，預設與起始相同")
    .option("--all-frames", "下載這趟飛行的所有 frame")
    .option("--fetch-from-next-day-also", "部分檔案放在隔天的資料夾")
    .option("--skip-validate", "略過下載後的驗證")
    .option("--dry-run", "只列出要下載的檔案")
    .option("--refetch-index", "強制重新抓取索引")
    .option("--max-num-to-fetch <n>", "最多下載的檔案數（除錯用）", {
      default: -1,
    })
    .action(async (output: string, raw: RawFetchOptions) => {
      const parsed = parseFetchOptions(raw);
      if (!parsed.ok) {
        baseLogger.error({ error: parsed.error })`參數錯誤: ${parsed.error.message}`;
        process.exit(1);
      }
      const options = parsed.value;
      const key = flightKey(options.flight);
      const logger = baseLogger.extend("fetch", { flight: key });
      const config = getAppConfig();
      const outputFolder = path.resolve(expandHome(output));

      const netrc = await readNetrc(expandHome(config.NETRC_PATH));
      if (!netrc.ok || !credentialsFor(netrc.value, config.EARTHDATA_HOST)) {
        logger.error({
          error: netrc.ok ? undefined : netrc.error,
        })`缺少 Earthdata 帳密 (${config.NETRC_PATH})，請參考 ${EARTHDATA_HELP_URL}`;
        process.exit(1);
      }

      const store = new SpecialCaseStoreJson(config.SPECIAL_CASES_PATH);
      const cases = await store.load();
      if (!cases.ok) {
        logger.error({ error: cases.error })`無法載入特例設定`;
        process.exit(1);
      }
      const adjustments = resolveAdjustments(
        cases.value,
        options.flight,
        options.type,
        { fetchNextDay: options.fetchNextDay }
      );

      const client = new ArchiveClientHttp({
        credentials: netrc.value,
        logger,
        timeoutMs: config.HTTP_TIMEOUT_MS,
      });
      const downloader = new BatchDownloader({
        client,
        logger,
        concurrency: config.DOWNLOAD_CONCURRENCY,
      });
      const inspector = new ImageInspectorExifTool();
      const fetchService = new FlightFetchService({
        indexService: new FlightIndexServiceDefault({
          client,
          layout: new ArchiveLayoutNsidc(config.ICEBRIDGE_ARCHIVE_URL),
          downloader,
          logger,
        }),
        downloader,
        validator: new FetchValidator({ inspector, logger }),
        logger,
      });

      logger.info({
        event: "start",
        type: options.type,
      })`開始下載到 ${outputFolder}`;

      let lastAttempt: FetchAttempt | undefined;
      try {
        const outcome = await retryUntilDone(
          async () => {
            const res = await fetchService.fetchOnce({
              ...options,
              outputFolder,
              adjustments,
            });
            if (!res.ok) return res;
            lastAttempt = res.value;
            return ok(res.value.numFailed);
          },
          logger,
          MAX_FETCH_ATTEMPTS
        );

        const reporter = new DumpWriterDefault(logger, config.DUMP_DIR);
        await reporter.dump(`fetch-${key}-${options.type}`, {
          outputFolder,
          adjustments,
          outcome,
          lastAttempt,
        });

        if (outcome.status === "error") {
          logger.error({ error: outcome.error })`下載失敗: ${outcome.error.message}`;
          process.exitCode = 1;
        } else if (outcome.status !== "success") {
          logger.error({
            status: outcome.status,
          })`仍有 ${outcome.numFailed} 個檔案無法取得`;
          process.exitCode = 1;
        } else {
          logger.info({ event: "done" })`第 ${outcome.attempts} 次嘗試全部完成`;
        }
      } finally {
        await dispose(inspector);
      }
    });
}
