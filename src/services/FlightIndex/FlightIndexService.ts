import type { Result } from "~shared/utils/Result";

import type { FetchAdjustments } from "@/services/SpecialCases";
import type { Flight, FrameIndex, ProductType } from "@/types";

export type FlightIndexError =
  | { type: "SITE_REQUIRED"; message: string }
  | { type: "LISTING_FAILED"; url: string; message: string }
  | { type: "NO_GOOD_LIDAR_SOURCE"; urls: string[]; message: string }
  | { type: "FRAME_COLLISION"; frame: number; message: string }
  | { type: "WRITE_FAILED"; message: string };

export type FlightIndexResult = {
  indexPath: string;
  /** 光達會被換成實際找到的來源 */
  type: ProductType;
  /** 沿用既有的索引檔，沒有重新抓取 */
  reused: boolean;
  /** 重新抓取時的內容 */
  index?: FrameIndex;
};

export interface FlightIndexService {
  buildIndex(
    flight: Flight,
    type: ProductType,
    outputFolder: string,
    options: { refetch?: boolean; adjustments: FetchAdjustments }
  ): Promise<Result<FlightIndexResult, FlightIndexError>>;
}
