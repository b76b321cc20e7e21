import { mkdir, open, readFile, rename, rm } from "fs/promises";
import path from "path";
import { type CheckpointSnapshot, parseCheckpointSnapshot } from "../../core/crawl/CrawlState";
import { CorruptStateError } from "../../core/crawl/crawl.errors";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { hasErrorCode } from "./fsErrors";

/**
 * Checkpoint kept as one JSON document. Saves go to a temp file that is fsynced and renamed over
 * the real one, so readers see either the previous checkpoint or the new one.
 */
export class JsonFileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly source: string
  ) {}

  async load(): Promise<CheckpointSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw new CorruptStateError(`Checkpoint ${this.filePath} is unreadable`, this.context(), error);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError(`Checkpoint ${this.filePath} is not valid JSON`, this.context(), error);
    }

    const parsed = parseCheckpointSnapshot(decoded);
    if (!parsed.ok) {
      throw new CorruptStateError(`Checkpoint ${this.filePath} is invalid: ${parsed.reason}`, this.context());
    }
    if (parsed.snapshot.source !== this.source) {
      throw new CorruptStateError(
        `Checkpoint ${this.filePath} belongs to source "${parsed.snapshot.source}"`,
        this.context()
      );
    }
    return parsed.snapshot;
  }

  async save(snapshot: CheckpointSnapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      const handle = await open(tmpPath, "w");
      try {
        await handle.writeFile(JSON.stringify(snapshot), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }

  async reset(): Promise<void> {
    await rm(this.filePath, { force: true });
  }

  private context() {
    return { source: this.source, path: this.filePath };
  }
}
