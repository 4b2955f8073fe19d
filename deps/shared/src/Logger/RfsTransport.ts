import {
  type Options as RfsOptions,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: RfsOptions;
};

/**
 * 以 JSON Lines 格式寫入檔案，並依大小/時間輪替。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    const line = JSON.stringify(
      {
        time: record.time,
        level: record.level,
        path: record.path.join(":"),
        event: record.event,
        msg: record.msg,
        ...record.context,
        err: record.err,
      },
      (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value
    );
    this.stream.write(`${line}\n`);
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
