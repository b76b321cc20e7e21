import { createReadStream } from "fs";
import { mkdir, open, rename, rm, stat } from "fs/promises";
import path from "path";
import { createInterface } from "readline";
import type { RecordEnvelope } from "../../core/catalog/catalog.types";
import { CorruptStateError } from "../../core/crawl/crawl.errors";
import type { RecordSink, SinkOpenResult } from "../../ports/RecordSink";
import { hasErrorCode } from "./fsErrors";

const NEWLINE = 0x0a;
const TAIL_CHUNK_BYTES = 64 * 1024;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringMap = (value: unknown): value is Record<string, string> =>
  isRecord(value) && Object.values(value).every((v) => typeof v === "string");

export const parseEnvelopeLine = (line: string): RecordEnvelope | undefined => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(decoded) || typeof decoded.key !== "string") return undefined;
  if (!isRecord(decoded.record) || !isStringMap(decoded.sourceMetadata)) return undefined;
  return { key: decoded.key, record: decoded.record, sourceMetadata: decoded.sourceMetadata };
};

/**
 * Line-delimited JSON record store, one envelope per line, fsynced after every append.
 */
export class JsonlRecordSink implements RecordSink {
  constructor(
    private readonly filePath: string,
    private readonly source: string
  ) {}

  async open(): Promise<SinkOpenResult> {
    await mkdir(path.dirname(this.filePath), { recursive: true });

    let dropped: number;
    try {
      dropped = await this.dropTornTail();
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return { committedKeys: [], discarded: false };
      throw error;
    }
    if (dropped > 0) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "crawl.sink_repaired",
        source: this.source,
        path: this.filePath,
        droppedBytes: dropped
      }));
    }

    try {
      const envelopes = await this.readAll();
      return { committedKeys: envelopes.map((envelope) => envelope.key), discarded: false };
    } catch (error) {
      if (!(error instanceof CorruptStateError)) throw error;
      const asidePath = `${this.filePath}.corrupt-${Date.now()}`;
      await rename(this.filePath, asidePath);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "crawl.sink_corrupt",
        source: this.source,
        reason: error.message,
        movedTo: asidePath
      }));
      return { committedKeys: [], discarded: true };
    }
  }

  async append(envelopes: RecordEnvelope[]): Promise<{ appended: number }> {
    if (envelopes.length === 0) return { appended: 0 };

    const payload = envelopes.map((envelope) => `${JSON.stringify(envelope)}\n`).join("");
    const handle = await open(this.filePath, "a");
    try {
      await handle.writeFile(payload, "utf-8");
      await handle.datasync();
    } finally {
      await handle.close();
    }
    return { appended: envelopes.length };
  }

  /** Every stored envelope in acceptance order. */
  async readAll(): Promise<RecordEnvelope[]> {
    try {
      await stat(this.filePath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }

    const envelopes: RecordEnvelope[] = [];
    const stream = createReadStream(this.filePath, { encoding: "utf-8" });
    const lines = createInterface({ input: stream, crlfDelay: Infinity });

    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber += 1;
        if (line.trim() === "") continue;
        const envelope = parseEnvelopeLine(line);
        if (!envelope) {
          throw new CorruptStateError(`Record store ${this.filePath} has an unreadable line ${lineNumber}`, {
            source: this.source,
            path: this.filePath
          });
        }
        envelopes.push(envelope);
      }
    } finally {
      lines.close();
      stream.destroy();
    }
    return envelopes;
  }

  async reset(): Promise<void> {
    await rm(this.filePath, { force: true });
  }

  async close(): Promise<void> {
    // handles are opened per append; nothing stays open between calls
  }

  /**
   * A crash mid-append can leave a last line without its newline. Cuts the file back to the last
   * complete line and returns how many bytes were removed.
   */
  private async dropTornTail(): Promise<number> {
    const handle = await open(this.filePath, "r+");
    try {
      const { size } = await handle.stat();
      if (size === 0) return 0;

      const chunk = Buffer.alloc(Math.min(size, TAIL_CHUNK_BYTES));
      let end = size;
      while (end > 0) {
        const start = Math.max(0, end - chunk.length);
        const length = end - start;
        await handle.read(chunk, 0, length, start);
        const lastNewline = chunk.subarray(0, length).lastIndexOf(NEWLINE);

        if (end === size && lastNewline === length - 1) return 0;
        if (lastNewline >= 0) {
          const keep = start + lastNewline + 1;
          await handle.truncate(keep);
          return size - keep;
        }
        end = start;
      }

      await handle.truncate(0);
      return size;
    } finally {
      await handle.close();
    }
  }
}
