import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly dir: string = "dist/reports"
  ) {}

  async dump(name: string, data: unknown): Promise<string | undefined> {
    const stamp = format(new Date(), "yyyyMMdd-HHmmss-SSS");
    const filePath = path.join(this.dir, `${stamp}-${toFileName(name)}.json`);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(filePath, JSON.stringify(data, replacer, 2), "utf8");
    } catch (error) {
      this.logger.error({ error, filePath })`報告 ${name} 輸出失敗`;
      return undefined;
    }
    this.logger.info({ emoji: "📝", filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}

function toFileName(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}

function replacer(_key: string, value: unknown) {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}
