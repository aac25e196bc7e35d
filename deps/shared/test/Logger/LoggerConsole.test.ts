import kleur from "kleur";
import { describe, expect, test } from "vitest";

import { type LogRecord, type LogTransport, LoggerConsole } from "~shared/Logger";

function captureConsole<T>(fn: () => T): {
  output: string;
  errorOutput: string;
  result: T;
} {
  let logOut = "";
  let errorOut = "";
  const original = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
    log: console.log,
  };

  console.debug = (...args) => (logOut += args.join(" ") + "\n");
  console.info = (...args) => (logOut += args.join(" ") + "\n");
  console.warn = (...args) => (logOut += args.join(" ") + "\n");
  console.log = (...args) => (logOut += args.join(" ") + "\n");
  console.error = (...args) => (errorOut += args.join(" ") + "\n");

  let result: T;
  try {
    result = fn();
  } finally {
    Object.assign(console, original);
  }

  return { output: logOut.trim(), errorOutput: errorOut.trim(), result };
}

function expectConsoleContains(
  fn: () => void,
  contains: {
    out?: string[];
    errorOut?: string[];
  }
) {
  const { output, errorOutput } = captureConsole(fn);
  if (contains.out)
    for (const str of contains.out) {
      expect(output).toContain(str);
    }
  if (contains.errorOut)
    for (const str of contains.errorOut) {
      expect(errorOutput).toContain(str);
    }
}

const emojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  error: "❌",
  warn: "⚠️",
  debug: "🐛",
};

describe("LoggerConsole", () => {
  test("context 的 emoji 優先於 emojiMap", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const { output } = captureConsole(() =>
      logger.info({ event: "start", emoji: "🌟", userId: "abc" }, "啟動")
    );
    expect(output).toBe('🌟 start: 啟動 {"userId":"abc"}');
  });

  test("沒有指定 emoji 時使用 emojiMap[event]", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() =>
      logger.info({ event: "start" }, "同步開始")
    );
    expect(output).toBe("🏁 start: 同步開始");
  });

  test("沒有 event 時使用 emojiMap[level]", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => logger.info({}, "預設 info emoji"));
    expect(output).toBe("ℹ️ info: 預設 info emoji");
  });

  test("只傳字串也能輸出", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => logger.warn("來源目錄是空的"));
    expect(output).toBe("⚠️ warn: 來源目錄是空的");
  });

  test("extend 的 emoji 依序退回", () => {
    const base = new LoggerConsole("info", [], {}, emojiMap).extend("base", {
      emoji: "🌟",
    });
    expectConsoleContains(() => base.info()`A`, {
      out: ["🌟 base:info: A"],
    });
    const level1 = base.extend("level1", { emoji: "🚀" });
    expectConsoleContains(() => level1.info()`B`, {
      out: ["🚀 base:level1:info: B"],
    });
    expectConsoleContains(() => level1.info({ event: "start" })`C`, {
      out: ["🏁 base:level1:start: C"],
    });
    expectConsoleContains(() => level1.warn()`D`, {
      out: ["⚠️ base:level1:warn: D"],
    });
    const level1_n = base.extend("level1_n");
    expectConsoleContains(() => level1_n.info()`E`, {
      out: ["🌟 base:level1_n:info: E"],
    });
  });

  test("template 參數會上色並記錄到 context", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => {
      logger.info({ event: "done", count: 10 })`完成 ${10} 項任務`;
    });
    expect(output).toContain("✅");
    expect(output).toContain(`done: 完成 ${kleur.green("10")} 項任務`);
    expect(output).toContain('"__0":10');
  });

  test("低於設定等級的紀錄不輸出", () => {
    const logger = new LoggerConsole("warn", [], {}, emojiMap);
    const { output } = captureConsole(() => {
      logger.info({ event: "start" }, "不會出現");
      logger.debug()`也不會出現`;
    });
    expect(output).toBe("");
  });

  test("extend 會把名稱加到路徑", () => {
    const root = new LoggerConsole("debug", [], {}, emojiMap);
    const syncLogger = root.extend("sync");
    const { output } = captureConsole(() =>
      syncLogger.info({ event: "start" }, "模組開始")
    );
    expect(output).toBe("🏁 sync:start: 模組開始");
  });

  test("append 只合併 context，不改變路徑", () => {
    const root = new LoggerConsole("debug", [], {}, emojiMap);
    const reqLogger = root.append({ traceId: "abc-123" });
    const { output } = captureConsole(() =>
      reqLogger.info({ event: "done" }, "完成")
    );
    expect(output).toBe('✅ done: 完成 {"traceId":"abc-123"}');
  });

  test("error 會輸出錯誤的 stack", () => {
    const error = new Error("爆炸了");
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    expectConsoleContains(
      () => logger.error({ error, event: "error" }, "錯誤"),
      {
        errorOut: ["❌ error: 錯誤", "Error: 爆炸了"],
      }
    );
    expectConsoleContains(() => logger.error({}, "錯誤A"), {
      errorOut: ["error: 錯誤A", "Error: 錯誤A"],
    });
    expectConsoleContains(() => logger.error()`錯誤B`, {
      errorOut: ["error: 錯誤B", "Error: 錯誤B"],
    });
  });

  test("非 Error 的錯誤物件以 type 作為名稱", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const records: LogRecord[] = [];
    logger.attachTransport({
      write(record) {
        records.push(record);
      },
      async [Symbol.asyncDispose]() {},
    });
    captureConsole(() =>
      logger.error({
        error: { type: "SCAN_FAILED", message: "no such dir" },
      })`掃描失敗`
    );
    expect(records[0].err).toEqual({
      type: "SCAN_FAILED",
      name: "SCAN_FAILED",
      message: "no such dir",
    });
  });

  test("stack 指向呼叫 logger 的位置", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    function theMethod(logger: LoggerConsole) {
      logger.error()`錯誤位置測試`;
    }
    const { errorOutput } = captureConsole(() => {
      theMethod(logger);
    });
    const matches = errorOutput.match(/at (\S+) /);
    expect(matches?.[1]).toBe("theMethod");
  });

  test("傳給 Transport 的紀錄包含路徑、訊息與 stack", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap).extend("fetch");
    function theMethod(logger: LoggerConsole) {
      logger.error({ flight: "20111018" })`下載 ${3} 個檔案失敗`;
    }
    const records: LogRecord[] = [];
    const transport: LogTransport = {
      write(record) {
        records.push(record);
      },
      async [Symbol.asyncDispose]() {},
    };
    logger.attachTransport(transport);
    captureConsole(() => {
      theMethod(logger);
    });
    expect(records.length).toBe(1);
    const [record] = records;
    expect(record.level).toBe("error");
    expect(record.path).toBe("fetch");
    expect(record.msg).toBe("下載 3 個檔案失敗");
    expect(record.context).toEqual({ flight: "20111018", __0: 3 });
    const matches = (record.err?.stack ?? "").match(/at (\S+) /);
    expect(matches?.[1]).toBe("theMethod");
  });
});
