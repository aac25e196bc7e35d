import { mkdir, readFile, rm } from "node:fs/promises";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { ArchiveClientHttp, type FetchLike, parseNetrc } from "@/services/ArchiveClient";
import { exists } from "@/utils/helper";

const tmpDir = "test/tmp/archive-client";
const credentials = parseNetrc("machine urs.test login alice password test-secret");

type SeenRequest = {
  url: string;
  method?: string;
  auth: string | null;
  cookie: string | null;
};

function buildClient(
  handler: (url: string, headers: Headers) => Response,
  options: { maxRedirects?: number; timeoutMs?: number } = {}
) {
  const seen: SeenRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const headers = new Headers(init?.headers);
    seen.push({
      url,
      method: init?.method,
      auth: headers.get("authorization"),
      cookie: headers.get("cookie"),
    });
    return handler(url, headers);
  };
  const client = new ArchiveClientHttp({
    credentials,
    logger: buildTestLogger(),
    fetchImpl,
    ...options,
  });
  return { client, seen };
}

/** 先送出一段資料，之後不再傳輸也不結束 */
function stalledBody() {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode("partial"));
    },
  });
}

function redirect(location: string) {
  return new Response(null, { status: 302, headers: { location } });
}

beforeAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(tmpDir, { recursive: true });
});

afterAll(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("ArchiveClientHttp", () => {
  test("exists 以狀態碼判斷，403 也算存在", async () => {
    const { client, seen } = buildClient((url) =>
      url.endsWith("/missing")
        ? new Response(null, { status: 404 })
        : new Response(null, { status: 403 })
    );
    expect(await client.exists("https://data.test/folder")).toBe(true);
    expect(await client.exists("https://data.test/missing")).toBe(false);
    expect(seen[0].method).toBe("HEAD");
  });

  test("exists 不跟隨轉址", async () => {
    const { client, seen } = buildClient(() => redirect("https://urs.test/login"));
    expect(await client.exists("https://data.test/folder")).toBe(true);
    expect(seen.length).toBe(1);
  });

  test("轉址到登入主機時帶上 Basic 認證", async () => {
    const { client, seen } = buildClient((url) => {
      if (url === "https://data.test/folder") return redirect("https://urs.test/oauth");
      if (url === "https://urs.test/oauth") return redirect("/back");
      return new Response("<html>listing</html>", { status: 200 });
    });

    const res = await client.fetchText("https://data.test/folder");
    expectOk(res);
    expect(res.value).toBe("<html>listing</html>");
    expect(seen.map((s) => s.url)).toEqual([
      "https://data.test/folder",
      "https://urs.test/oauth",
      "https://urs.test/back",
    ]);
    expect(seen[0].auth).toBeNull();
    expect(seen[1].auth).toBe(
      `Basic ${Buffer.from("alice:test-secret").toString("base64")}`
    );
  });

  test("非 2xx 回應回傳 HTTP_ERROR", async () => {
    const { client } = buildClient(() => new Response("oops", { status: 500 }));
    const res = await client.fetchText("https://data.test/folder");
    expectErr(res);
    expect(res.error).toMatchObject({ type: "HTTP_ERROR", status: 500 });
  });

  test("轉址次數超過上限", async () => {
    const { client, seen } = buildClient(() => redirect("https://data.test/loop"), {
      maxRedirects: 2,
    });
    const res = await client.fetchText("https://data.test/loop");
    expectErr(res);
    expect(res.error.type).toBe("TOO_MANY_REDIRECTS");
    expect(seen.length).toBe(3);
  });

  test("連線失敗回傳 NETWORK_ERROR", async () => {
    const { client } = buildClient(() => {
      throw new Error("connect ECONNREFUSED");
    });
    const res = await client.fetchText("https://data.test/folder");
    expectErr(res);
    expect(res.error).toEqual({
      type: "NETWORK_ERROR",
      url: "https://data.test/folder",
      message: "connect ECONNREFUSED",
    });
  });

  test("下載寫入檔案，不留下 .part", async () => {
    const { client } = buildClient(() => new Response("file-body", { status: 200 }));
    const dest = `${tmpDir}/sub/a.tif`;
    const res = await client.download("https://data.test/a.tif", dest);
    expectOk(res);
    expect(await readFile(dest, "utf8")).toBe("file-body");
    expect(await exists(`${dest}.part`)).toBe(false);
  });

  test("下載 404 時不建立檔案", async () => {
    const { client } = buildClient(() => new Response(null, { status: 404 }));
    const dest = `${tmpDir}/missing.tif`;
    const res = await client.download("https://data.test/missing.tif", dest);
    expectErr(res);
    expect(res.error).toMatchObject({ type: "HTTP_ERROR", status: 404 });
    expect(await exists(dest)).toBe(false);
  });

  test("登入來回時保存 cookie，之後對同一主機的請求都會帶上", async () => {
    const { client, seen } = buildClient((url, headers) => {
      if (url === "https://data.test/callback") {
        return new Response(null, {
          status: 302,
          headers: [
            ["location", "/folder"],
            ["set-cookie", "session=abc123; Path=/; HttpOnly"],
          ],
        });
      }
      if (url === "https://urs.test/oauth") return redirect("https://data.test/callback");
      if (headers.get("cookie") === null) return redirect("https://urs.test/oauth");
      return new Response("listing", { status: 200 });
    });

    const first = await client.fetchText("https://data.test/folder");
    expectOk(first);
    expect(first.value).toBe("listing");
    expect(seen.map((s) => [s.url, s.cookie])).toEqual([
      ["https://data.test/folder", null],
      ["https://urs.test/oauth", null],
      ["https://data.test/callback", null],
      ["https://data.test/folder", "session=abc123"],
    ]);

    const second = await client.fetchText("https://data.test/other");
    expectOk(second);
    expect(seen.length).toBe(5);
    expect(seen[4]).toMatchObject({ url: "https://data.test/other", cookie: "session=abc123" });
  });

  test("下載途中停止傳輸時逾時，不留下檔案", async () => {
    const { client } = buildClient(
      () => new Response(stalledBody(), { status: 200 }),
      { timeoutMs: 50 }
    );
    const dest = `${tmpDir}/stalled.tif`;
    const res = await client.download("https://data.test/stalled.tif", dest);
    expectErr(res);
    expect(res.error).toEqual({
      type: "TIMEOUT",
      url: "https://data.test/stalled.tif",
      message: "50 ms 內沒有收到資料",
    });
    expect(await exists(dest)).toBe(false);
    expect(await exists(`${dest}.part`)).toBe(false);
  });

  test("讀取列表途中停止傳輸時逾時", async () => {
    const { client } = buildClient(
      () => new Response(stalledBody(), { status: 200 }),
      { timeoutMs: 50 }
    );
    const res = await client.fetchText("https://data.test/folder");
    expectErr(res);
    expect(res.error).toEqual({
      type: "TIMEOUT",
      url: "https://data.test/folder",
      message: "50 ms 內沒有收到資料",
    });
  });
});
