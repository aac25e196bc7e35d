import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

export type NetrcEntry = { login: string; password: string };

export type NetrcCredentials = {
  machines: Map<string, NetrcEntry>;
  default?: NetrcEntry;
};

/**
 * 解析 ~/.netrc。支援 machine / default / login / password，
 * account 會被略過，macdef 區塊讀到空行為止。
 */
export function parseNetrc(text: string): NetrcCredentials {
  const tokens: string[] = [];
  let inMacdef = false;
  for (const line of text.split(/\r?\n/)) {
    if (inMacdef) {
      if (line.trim() === "") inMacdef = false;
      continue;
    }
    const lineTokens = line.trim().split(/\s+/).filter(Boolean);
    const macdefAt = lineTokens.indexOf("macdef");
    if (macdefAt >= 0) {
      tokens.push(...lineTokens.slice(0, macdefAt));
      inMacdef = true;
      continue;
    }
    tokens.push(...lineTokens);
  }

  const credentials: NetrcCredentials = { machines: new Map() };
  let current: { machine?: string; login?: string; password?: string } | null =
    null;

  const flush = () => {
    if (!current || current.login === undefined) return;
    const entry = { login: current.login, password: current.password ?? "" };
    if (current.machine === undefined) credentials.default = entry;
    else credentials.machines.set(current.machine, entry);
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    switch (token) {
      case "machine":
        flush();
        current = { machine: tokens[++i] };
        break;
      case "default":
        flush();
        current = {};
        break;
      case "login":
        if (current) current.login = tokens[++i];
        break;
      case "password":
        if (current) current.password = tokens[++i];
        break;
      case "account":
        i++;
        break;
    }
  }
  flush();
  return credentials;
}

export function credentialsFor(
  credentials: NetrcCredentials,
  host: string
): NetrcEntry | undefined {
  return credentials.machines.get(host) ?? credentials.default;
}

export async function readNetrc(
  filePath: string
): Promise<Result<NetrcCredentials, { type: "NETRC_NOT_FOUND"; message: string }>> {
  try {
    const text = await readFile(filePath, "utf8");
    return ok(parseNetrc(text));
  } catch (e) {
    return err({
      type: "NETRC_NOT_FOUND",
      message: `無法讀取 ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
    });
  }
}
