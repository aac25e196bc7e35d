import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ArchiveClient, ArchiveError } from "./ArchiveClient";
import { type NetrcCredentials, credentialsFor } from "./Netrc";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** 存在的資料夾會回 200/301/302/403，不存在則是 404 */
const existingStatuses = new Set([200, 301, 302, 403]);
const redirectStatuses = new Set([301, 302, 303, 307, 308]);

/**
 * 以 Earthdata Login 存取 NSIDC 的 HTTPS 客戶端。
 *
 * 轉址自行處理：往 netrc 中有帳密的主機送出 Basic 認證，
 * 並保存每個主機回傳的 cookie，讓 OAuth 來回之後能帶著 session 回到資料主機。
 */
export class ArchiveClientHttp implements ArchiveClient {
  private readonly credentials: NetrcCredentials;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly cookies = new Map<string, Map<string, string>>();

  constructor(deps: {
    credentials: NetrcCredentials;
    logger: Logger;
    timeoutMs?: number;
    maxRedirects?: number;
    fetchImpl?: FetchLike;
  }) {
    this.credentials = deps.credentials;
    this.logger = deps.logger.extend("ArchiveClientHttp");
    this.timeoutMs = deps.timeoutMs ?? 120_000;
    this.maxRedirects = deps.maxRedirects ?? 10;
    this.fetchImpl = deps.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async exists(url: string): Promise<boolean> {
    const timer = new IdleTimer(this.timeoutMs);
    try {
      const res = await this.request(url, "HEAD", false, timer);
      if (!res.ok) {
        this.logger.warn({ error: res.error })`無法確認網址 ${url}`;
        return false;
      }
      const { status } = res.value;
      this.logger.debug({ status })`HEAD ${url}`;
      return existingStatuses.has(status) || (status >= 200 && status < 300);
    } finally {
      timer.stop();
    }
  }

  async fetchText(url: string): Promise<Result<string, ArchiveError>> {
    const timer = new IdleTimer(this.timeoutMs);
    try {
      const res = await this.request(url, "GET", true, timer);
      if (!res.ok) return res;
      const response = res.value;
      if (!response.ok) {
        await response.body?.cancel();
        return err(httpError(url, response));
      }
      const chunks: Uint8Array[] = [];
      await pipeline(
        bodyOf(response),
        touchEach(timer),
        async (source: AsyncIterable<Uint8Array>) => {
          for await (const chunk of source) chunks.push(chunk);
        },
        { signal: timer.signal }
      );
      return ok(Buffer.concat(chunks).toString("utf8"));
    } catch (e) {
      return err(
        timer.timedOut
          ? timeoutError(url, this.timeoutMs)
          : { type: "NETWORK_ERROR", url, message: errorMessage(e) }
      );
    } finally {
      timer.stop();
    }
  }

  async download(
    url: string,
    destPath: string
  ): Promise<Result<void, ArchiveError>> {
    const timer = new IdleTimer(this.timeoutMs);
    try {
      const res = await this.request(url, "GET", true, timer);
      if (!res.ok) return res;
      const response = res.value;
      if (!response.ok) {
        await response.body?.cancel();
        return err(httpError(url, response));
      }

      const partPath = `${destPath}.part`;
      try {
        await mkdir(path.dirname(destPath), { recursive: true });
        await pipeline(
          bodyOf(response),
          touchEach(timer),
          createWriteStream(partPath),
          { signal: timer.signal }
        );
        await rename(partPath, destPath);
        return ok();
      } catch (e) {
        await rm(partPath, { force: true });
        if (timer.timedOut) return err(timeoutError(url, this.timeoutMs));
        return err({ type: "WRITE_FAILED", url, message: errorMessage(e) });
      }
    } finally {
      timer.stop();
    }
  }

  private async request(
    url: string,
    method: "GET" | "HEAD",
    followRedirects: boolean,
    timer: IdleTimer
  ): Promise<Result<Response, ArchiveError>> {
    let current = url;
    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const res = await this.send(current, method, timer);
      if (!res.ok) return res;
      const response = res.value;
      this.storeCookies(current, response);

      const location = response.headers.get("location");
      if (!followRedirects || !redirectStatuses.has(response.status) || !location) {
        return ok(response);
      }
      await response.body?.cancel();
      const next = new URL(location, current).toString();
      this.logger.debug({ status: response.status })`轉址 ${current} → ${next}`;
      current = next;
    }
    return err({
      type: "TOO_MANY_REDIRECTS",
      url,
      message: `轉址超過 ${this.maxRedirects} 次`,
    });
  }

  private async send(
    url: string,
    method: "GET" | "HEAD",
    timer: IdleTimer
  ): Promise<Result<Response, ArchiveError>> {
    const headers = new Headers();
    const { host, hostname } = new URL(url);

    const login = credentialsFor(this.credentials, hostname);
    if (login) {
      const token = Buffer.from(`${login.login}:${login.password}`).toString(
        "base64"
      );
      headers.set("authorization", `Basic ${token}`);
    }
    const jar = this.cookies.get(host);
    if (jar && jar.size > 0) {
      headers.set(
        "cookie",
        [...jar.entries()].map(([k, v]) => `${k}=${v}`).join("; ")
      );
    }

    timer.touch();
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        redirect: "manual",
        signal: timer.signal,
      });
      timer.touch();
      return ok(response);
    } catch (e) {
      if (timer.timedOut) return err(timeoutError(url, this.timeoutMs));
      return err({ type: "NETWORK_ERROR", url, message: errorMessage(e) });
    }
  }

  private storeCookies(url: string, response: Response) {
    const setCookies = response.headers.getSetCookie();
    if (setCookies.length === 0) return;
    const { host } = new URL(url);
    const jar = this.cookies.get(host) ?? new Map<string, string>();
    for (const cookie of setCookies) {
      const [pair] = cookie.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
    this.cookies.set(host, jar);
  }
}

/** 超過 ms 沒有收到任何資料就中止；每收到一段資料重新計時 */
class IdleTimer {
  private readonly controller = new AbortController();
  private timeoutId: ReturnType<typeof setTimeout> | undefined;

  constructor(private readonly ms: number) {
    this.touch();
  }

  get signal() {
    return this.controller.signal;
  }

  get timedOut() {
    return this.controller.signal.aborted;
  }

  touch() {
    clearTimeout(this.timeoutId);
    this.timeoutId = setTimeout(() => this.controller.abort(), this.ms);
  }

  stop() {
    clearTimeout(this.timeoutId);
  }
}

function bodyOf(response: Response): Readable {
  return response.body ? Readable.fromWeb(response.body) : Readable.from([]);
}

function touchEach(timer: IdleTimer) {
  return async function* (source: AsyncIterable<Uint8Array>) {
    for await (const chunk of source) {
      timer.touch();
      yield chunk;
    }
  };
}

function timeoutError(url: string, ms: number): ArchiveError {
  return { type: "TIMEOUT", url, message: `${ms} ms 內沒有收到資料` };
}

function httpError(url: string, response: Response): ArchiveError {
  return {
    type: "HTTP_ERROR",
    url,
    status: response.status,
    message: `HTTP ${response.status} ${response.statusText}`.trim(),
  };
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
