import { addDays, format } from "date-fns";

import type { Flight, ProductType } from "@/types";

import type { ArchiveLayout } from "./ArchiveLayout";

const productFolders: Record<Exclude<ProductType, "image">, string> = {
  ortho: "ICEBRIDGE/IODMS1B.001",
  dem: "ICEBRIDGE/IODMS3.001",
  lvis: "ICEBRIDGE/ILVIS2.001",
  atm1: "ICEBRIDGE/ILATM1B.001",
  atm2: "ICEBRIDGE/ILATM1B.002",
};

const rawImageFolder = "ICEBRIDGE_FTP/IODMS0_DMSraw_v01";

/**
 * NSIDC 的目錄結構：
 * - 原始影像：IODMS0_DMSraw_v01/2011_GR_NASA/10182011_raw
 * - 其他產品：IODMS1B.001/2011.10.18
 */
export class ArchiveLayoutNsidc implements ArchiveLayout {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  folderUrl(
    flight: Flight,
    type: ProductType,
    options?: { dayOffset?: number; folderSuffix?: string }
  ): string {
    const date = addDays(
      new Date(flight.year, flight.month - 1, flight.day),
      options?.dayOffset ?? 0
    );
    const ext = options?.folderSuffix ?? flight.ext;

    if (type === "image") {
      if (!flight.site) {
        throw new Error("原始影像的網址需要指定 site (AN 或 GR)");
      }
      // 年份資料夾是以任務年份歸類，不隨 dayOffset 改變
      const yearFolder = `${flight.year}_${flight.site}_NASA`;
      const dateFolder = `${format(date, "MMddyyyy")}${ext}_raw`;
      return [this.baseUrl, rawImageFolder, yearFolder, dateFolder].join("/");
    }

    const dateFolder = `${format(date, "yyyy.MM.dd")}${ext}`;
    return [this.baseUrl, productFolders[type], dateFolder].join("/");
  }
}
