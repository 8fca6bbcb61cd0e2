import fs from "fs/promises";
import path from "path";
import { logger } from "../logger";
import { OutboundMessage } from "./messages";
import { RecordSink } from "./sink";

function timestamp(date: Date): string {
  // 2026-10-18T09:05:03.000Z -> 20261018-090503
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}-${iso.slice(11, 19).replace(/:/g, "")}`;
}

/**
 * Writes each batch to `<outputDir>/<topic>_<yyyymmdd-hhmmss>.json`.
 */
export class FileSink implements RecordSink {
  readonly name = "file";

  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async publish(topic: string, messages: OutboundMessage[]): Promise<number> {
    if (!messages.length) return 0;

    const writtenAt = this.now();
    const file = path.join(this.outputDir, `${topic}_${timestamp(writtenAt)}.json`);

    const entries: { key: string; value: unknown }[] = messages.map((message) => ({
      key: message.key,
      value: JSON.parse(message.value),
    }));

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(
      file,
      JSON.stringify({ topic, writtenAt: writtenAt.toISOString(), count: entries.length, messages: entries }, null, 2),
      "utf8"
    );

    logger.info({ file, count: entries.length }, "Messages written to file");
    return entries.length;
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
