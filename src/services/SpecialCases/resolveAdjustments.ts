import { format } from "date-fns";

import type { Flight, ProductType } from "@/types";
import { isLidarType } from "@/utils/fileNames";

import type { FetchAdjustments, SpecialCase } from "./SpecialCases";

/** YYYYMMDD 加上資料夾後綴 */
export function flightKey(flight: Flight) {
  const date = new Date(flight.year, flight.month - 1, flight.day);
  return `${format(date, "yyyyMMdd")}${flight.ext}`;
}

export function matchesFlight(
  specialCase: SpecialCase,
  flight: Flight,
  type: ProductType
) {
  if (specialCase.date !== flightKey(flight)) return false;
  if (specialCase.site !== undefined && specialCase.site !== flight.site) {
    return false;
  }
  const { product } = specialCase;
  if (product === undefined || product === type) return true;
  // 光達來源要到建立索引時才確定，任一光達特例都適用
  return isLidarType(product) && isLidarType(type);
}

/**
 * 合併所有符合的特例。
 * 正射影像一律嘗試以緯度分開；命令列的 fetchNextDay 等同 append-next-day。
 */
export function resolveAdjustments(
  cases: readonly SpecialCase[],
  flight: Flight,
  type: ProductType,
  options: { fetchNextDay?: boolean } = {}
): FetchAdjustments {
  const adjustments: FetchAdjustments = {
    dayOffsets: [0],
    folderSuffixes: [flight.ext],
    separateByLatitude: type === "ortho",
    notes: [],
  };
  const addNextDay = () => {
    if (!adjustments.dayOffsets.includes(1)) adjustments.dayOffsets.push(1);
  };
  if (options.fetchNextDay) addNextDay();

  for (const specialCase of cases) {
    if (!matchesFlight(specialCase, flight, type)) continue;
    adjustments.notes.push(specialCase.note);
    switch (specialCase.action) {
      case "append-next-day":
        addNextDay();
        break;
      case "merge-subfolders":
        if (specialCase.folders && specialCase.folders.length > 0) {
          adjustments.folderSuffixes = [...specialCase.folders];
        }
        break;
      case "separate-by-latitude":
        adjustments.separateByLatitude = true;
        break;
    }
  }
  return adjustments;
}
