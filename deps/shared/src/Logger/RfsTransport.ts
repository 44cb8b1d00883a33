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

/** 以 JSON lines 寫入輪替檔案，預設 5MB 一檔、保留 3 份 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "5M",
      maxFiles: 3,
      ...options.rfs,
    });
    this.stream.on("error", (error) => {
      console.error("RfsTransport 寫入失敗", error);
    });
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
