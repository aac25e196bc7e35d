export const lidarTypes = ["lvis", "atm1", "atm2"] as const;

export const productTypes = ["image", "ortho", "dem", ...lidarTypes] as const;

export const sites = ["AN", "GR"] as const;

export const imageExtensions = [".tif", ".jpg", ".jpeg", ".ntf"] as const;

/** 一次排入下載的檔案數 */
export const MAX_IN_ONE_CALL = 100;

/** 下載 → 驗證 的最多嘗試次數 */
export const MAX_FETCH_ATTEMPTS = 10;

export const SMALLEST_FRAME = 0;
export const LARGEST_FRAME = 99_999_999;

export const BATCH_COMMAND_LOG_FILE = "batch_commands_log.txt";

export const EARTHDATA_HELP_URL =
  "https://nsidc.org/support/faq/what-options-are-available-bulk-downloading-data-https-earthdata-login-enabled";
