import path from "node:path";

/**
 * 從檔名取出日期與時間字串。
 * 第一個 8 位數段落為日期 (YYYYMMDD)，之後的 6 或 8 位數段落為時間 (hhmmss[ff])。
 */
export function parseTimeStamps(
  fileName: string
): [date: string, time: string] | undefined {
  const parts = path.basename(fileName).replace(/[.-]/g, "_").split("_");

  let date = "";
  let time = "";
  for (const part of parts) {
    if (!/^(\d{6}|\d{8})$/.test(part)) continue;
    if (date === "" && part.length === 8) {
      date = part;
      continue;
    }
    if (time === "") {
      time = part;
    }
  }

  if (date === "" || time === "") return undefined;
  return [date, time];
}

/**
 * 解析 20110323 + 17433900 這類字串為 UTC 時間。
 * 8 位數時間的最後兩位是百分之一秒。
 * secondsFix：部分光達檔案的秒數是 1-60，需要減一。
 */
export function parseDateTime(
  date: string,
  time: string,
  secondsFix = false
): Date | undefined {
  const year = Number(date.slice(0, 4));
  const month = Number(date.slice(4, 6));
  const day = Number(date.slice(6, 8));
  const hour = Number(time.slice(0, 2));
  const minute = Number(time.slice(2, 4));
  let second = Number(time.slice(4, 6));
  if (secondsFix) second -= 1;
  const hundredths = time.length > 6 ? Number(time.slice(6, 8)) : 0;

  const fields = [year, month, day, hour, minute, second, hundredths];
  if (fields.some((n) => !Number.isInteger(n))) return undefined;
  if (month < 1 || month > 12) return undefined;
  if (hour > 23 || minute > 59 || second < 0 || second > 59) return undefined;

  const result = new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, hundredths * 10)
  );
  // 2月30日之類的日期會被 Date 進位，視為無效
  if (result.getUTCDate() !== day) return undefined;
  return result;
}
