import type { lidarTypes, productTypes, sites } from "@/constants";

export type ProductType = (typeof productTypes)[number];

export type LidarType = (typeof lidarTypes)[number];

export type Site = (typeof sites)[number];

/**
 * 一趟飛行：以日期識別，ext 為同一天多趟飛行時附加的資料夾後綴（a、b）。
 */
export type Flight = {
  year: number;
  month: number; // 1-12
  day: number;
  ext: string;
  site?: Site;
};

export type IndexEntry = {
  frame: number;
  fileName: string;
  folderUrl: string;
};

export type FrameIndex = Map<number, IndexEntry>;

/** 投影座標下的外框 */
export type BoundingBox = {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
};
