import type { Result } from "~shared/utils/Result";

import type { BoundingBox } from "@/types";

export type ImageInfo = {
  filePath: string;
  width: number;
  height: number;
  /** 有 world file 或 GeoTIFF 標籤時才有 */
  bounds?: BoundingBox;
};

export type InspectError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_IMAGE"; message: string };

export interface ImageInspector {
  inspect(filePath: string): Promise<Result<ImageInfo, InspectError>>;
}
