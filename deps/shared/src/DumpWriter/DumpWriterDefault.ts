import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(
    logger: Logger,
    outputDir = "dist/reports",
    now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("DumpWriter");
    this.outputDir = outputDir;
    this.now = now;
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(
      this.outputDir,
      `${name}-${format(this.now(), "yyyyMMdd-HHmmss")}.json`
    );
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    this.logger.info({ emoji: "📝", event: "dump" })`已輸出 ${name}: ${filePath}`;
    return filePath;
  }
}
