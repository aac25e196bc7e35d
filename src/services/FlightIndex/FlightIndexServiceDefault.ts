import { rm } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { lidarTypes } from "@/constants";
import type { ArchiveClient } from "@/services/ArchiveClient";
import type { ArchiveLayout } from "@/services/ArchiveLayout";
import type { BatchDownloader } from "@/services/Fetch/BatchDownloader";
import { indexCsvPath, parseListing, writeIndexFile } from "@/services/Index";
import { isGoodLatitude, readLatitude } from "@/services/Metadata/XmlMetadata";
import type { FetchAdjustments } from "@/services/SpecialCases";
import type { Flight, FrameIndex, ProductType } from "@/types";
import { isLidarType, parseFrameNumber, xmlFileOf } from "@/utils/fileNames";
import { fileNonEmpty, wipe } from "@/utils/helper";

import type {
  FlightIndexError,
  FlightIndexResult,
  FlightIndexService,
} from "./FlightIndexService";

type FolderSource = { url: string; type: ProductType };

export class FlightIndexServiceDefault implements FlightIndexService {
  private readonly client: ArchiveClient;
  private readonly layout: ArchiveLayout;
  private readonly downloader: BatchDownloader;
  private readonly logger: Logger;

  constructor(deps: {
    client: ArchiveClient;
    layout: ArchiveLayout;
    downloader: BatchDownloader;
    logger: Logger;
  }) {
    this.client = deps.client;
    this.layout = deps.layout;
    this.downloader = deps.downloader;
    this.logger = deps.logger.extend("FlightIndex");
  }

  async buildIndex(
    flight: Flight,
    type: ProductType,
    outputFolder: string,
    options: { refetch?: boolean; adjustments: FetchAdjustments }
  ): Promise<Result<FlightIndexResult, FlightIndexError>> {
    const { adjustments } = options;
    if (type === "image" && !flight.site) {
      return err({
        type: "SITE_REQUIRED",
        message: "原始影像需要指定 site (AN 或 GR)",
      });
    }
    const isSouth = flight.site === "AN";
    const indexPath = indexCsvPath(outputFolder, type);

    // 合併多天的資料時，舊索引可能只有其中一天
    const refetch = options.refetch || adjustments.dayOffsets.length > 1;
    if (refetch) {
      await rm(indexPath, { force: true });
    } else if (await fileNonEmpty(indexPath)) {
      this.logger.info({ emoji: "♻️" })`已有索引檔 ${indexPath}，沿用`;
      return ok({ indexPath, type, reused: true });
    }

    for (const note of adjustments.notes) {
      this.logger.info({ emoji: "📌" })`特例: ${note}`;
    }

    const combined: FrameIndex = new Map();
    let resolvedType = type;
    for (const dayOffset of adjustments.dayOffsets) {
      for (const folderSuffix of adjustments.folderSuffixes) {
        let source: FolderSource | undefined;
        let local: FrameIndex | undefined;
        if (isLidarType(type)) {
          const found = await this.findLidarSource(
            flight,
            outputFolder,
            isSouth,
            { dayOffset, folderSuffix },
            adjustments.separateByLatitude
          );
          if (!found.ok) return found;
          if (!found.value) continue;
          source = found.value.source;
          local = found.value.index;
        } else {
          source = {
            url: this.layout.folderUrl(flight, type, { dayOffset, folderSuffix }),
            type,
          };
        }

        this.logger.info({ emoji: "🌐" })`抓取清單 ${source.url}`;
        if (!local) {
          const parsed = await this.parseFolder(
            source,
            outputFolder,
            isSouth,
            adjustments.separateByLatitude
          );
          if (!parsed.ok) return parsed;
          local = parsed.value;
        }
        resolvedType = source.type;

        // 先前的日期或資料夾已有的 frame 不覆蓋，以免混用
        const frames = [...local.keys()].sort((a, b) => a - b);
        for (const frame of frames) {
          const entry = local.get(frame);
          if (entry && !combined.has(frame)) combined.set(frame, entry);
        }
      }
    }

    try {
      await writeIndexFile(indexPath, combined.values());
    } catch (e) {
      return err({
        type: "WRITE_FAILED",
        message: `寫入索引失敗: ${indexPath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
    this.logger.info({
      event: "done",
    })`索引 ${indexPath} 共 ${combined.size} 個 frame`;
    return ok({ indexPath, type: resolvedType, reused: false, index: combined });
  }

  /**
   * 光達可能來自 lvis、atm1 或 atm2。
   * 有多個來源時，以各來源第一個 frame 的 XML 緯度決定。
   */
  private async findLidarSource(
    flight: Flight,
    outputFolder: string,
    isSouth: boolean,
    folder: { dayOffset: number; folderSuffix: string },
    separateByLatitude: boolean
  ): Promise<
    Result<{ source: FolderSource; index?: FrameIndex } | undefined, FlightIndexError>
  > {
    const sources: FolderSource[] = [];
    for (const lidar of lidarTypes) {
      const url = this.layout.folderUrl(flight, lidar, folder);
      this.logger.debug()`檢查光達網址 ${url}`;
      if (await this.client.exists(url)) {
        this.logger.info()`找到光達來源 ${lidar}`;
        sources.push({ url, type: lidar });
      }
    }

    if (sources.length === 0) {
      this.logger.warn({
        dayOffset: folder.dayOffset,
      })`這一天找不到任何光達資料`;
      return ok(undefined);
    }
    if (sources.length === 1) return ok({ source: sources[0] });

    this.logger.info({
      urls: sources.map((s) => s.url),
    })`有 ${sources.length} 個光達來源，以緯度挑選`;
    for (const source of sources) {
      const parsed = await this.parseFolder(
        source,
        outputFolder,
        isSouth,
        separateByLatitude
      );
      if (!parsed.ok) return parsed;
      const firstFrame = Math.min(...parsed.value.keys());
      const first = parsed.value.get(firstFrame);
      if (!first) continue;

      const xmlName = xmlFileOf(first.fileName);
      const probePath = path.join(outputFolder, `probe_${xmlName}`);
      const downloaded = await this.client.download(
        `${source.url}/${xmlName}`,
        probePath
      );
      if (!downloaded.ok) {
        this.logger.warn({ error: downloaded.error })`無法下載 ${xmlName}`;
        continue;
      }
      const latitude = await readLatitude(probePath);
      await wipe(probePath);
      if (latitude.ok && isGoodLatitude(latitude.value, isSouth)) {
        return ok({ source, index: parsed.value });
      }
    }

    return err({
      type: "NO_GOOD_LIDAR_SOURCE",
      urls: sources.map((s) => s.url),
      message: `沒有任何光達來源符合半球: ${sources.map((s) => s.url).join(" ")}`,
    });
  }

  private async parseFolder(
    source: FolderSource,
    outputFolder: string,
    isSouth: boolean,
    tryToSeparateByLatitude: boolean
  ): Promise<Result<FrameIndex, FlightIndexError>> {
    const html = await this.client.fetchText(source.url);
    if (!html.ok) {
      if (html.error.type === "HTTP_ERROR" && html.error.status === 404) {
        this.logger.warn()`資料夾不存在 ${source.url}`;
        return ok(new Map());
      }
      return err({
        type: "LISTING_FAILED",
        url: source.url,
        message: html.error.message,
      });
    }
    const fileNames = parseListing(html.value, source.type);

    // 同一個資料夾可能同時有 AN 與 GR 的檔案，frame 編號重複
    let separate = false;
    if (tryToSeparateByLatitude) {
      const seen = new Map<number, string>();
      for (const fileName of fileNames) {
        const frame = parseFrameNumber(fileName);
        if (frame === undefined) continue;
        const other = seen.get(frame);
        if (other !== undefined) {
          this.logger.info()`同一 frame 有兩個檔案：${other} 與 ${fileName}，以緯度分開`;
          separate = true;
          break;
        }
        seen.set(frame, fileName);
      }
    }

    const badXmls = new Set<string>();
    if (separate) {
      const xmlPaths = fileNames.map((f) => path.join(outputFolder, xmlFileOf(f)));
      const urls = fileNames.map((f) => `${source.url}/${xmlFileOf(f)}`);
      const fetched = await this.downloader.fetchAll(xmlPaths, urls);
      if (!fetched.ok) {
        return err({
          type: "LISTING_FAILED",
          url: source.url,
          message: fetched.error.message,
        });
      }
      for (const xmlPath of xmlPaths) {
        const latitude = await readLatitude(xmlPath);
        if (!latitude.ok || !isGoodLatitude(latitude.value, isSouth)) {
          badXmls.add(xmlPath);
          await wipe(xmlPath);
        }
      }
    }

    const index: FrameIndex = new Map();
    for (const fileName of fileNames) {
      if (badXmls.has(path.join(outputFolder, xmlFileOf(fileName)))) continue;
      const frame = parseFrameNumber(fileName);
      if (frame === undefined) {
        this.logger.debug()`無法解析 frame，略過 ${fileName}`;
        continue;
      }
      const existing = index.get(frame);
      if (existing && separate) {
        return err({
          type: "FRAME_COLLISION",
          frame,
          message: `兩個檔案的 frame 相同: ${existing.fileName} 與 ${fileName}`,
        });
      }
      index.set(frame, { frame, fileName, folderUrl: source.url });
    }
    return ok(index);
  }
}
