import type { Flight, ProductType } from "@/types";

export interface ArchiveLayout {
  /**
   * 某產品在某天的資料夾網址。
   * dayOffset 用於跨到隔天的資料夾；folderSuffix 為 a、b 之類的後綴。
   */
  folderUrl(
    flight: Flight,
    type: ProductType,
    options?: { dayOffset?: number; folderSuffix?: string }
  ): string;
}
