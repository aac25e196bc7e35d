import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON Lines 寫入輪替檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, options.rfs);
  }

  write(record: LogRecord) {
    const { context, ...core } = record;
    this.stream.write(JSON.stringify({ ...context, ...core }) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
