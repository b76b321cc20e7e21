import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { crawlSource } from "../../src/application/crawl-source/crawlSource.usecase";
import { CorruptStateError, FatalAuthError, TransientFetchError } from "../../src/core/crawl/crawl.errors";
import { JsonFileCheckpointStore } from "../../src/infrastructure/filesystem/JsonFileCheckpointStore";
import { JsonlRecordSink } from "../../src/infrastructure/filesystem/JsonlRecordSink";
import type { CheckpointStore } from "../../src/ports/CheckpointStore";
import {
  createInMemoryCheckpoints,
  createInMemorySink,
  createScriptedConnector,
  eventNames,
  loggedEvents,
  noSleep
} from "../support/inMemory";

const fastConfig = { maxRetries: 2, retryMinDelayMs: 1, retryMaxDelayMs: 5, pageDelay: { minMs: 0, maxMs: 0 } };

describe("crawlSource", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("drives every partition and reports the records accepted in this run", async () => {
    const { connector } = createScriptedConnector({
      partitions: { fruit: [{ id: 1 }, { id: 2 }, { id: 3 }], bread: [{ id: 3 }, { id: 4 }] }
    });
    const { sink, keys, calls } = createInMemorySink();

    const report = await crawlSource({
      connector,
      sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report).toEqual({
      totalRecords: 4,
      status: "success",
      partitions: { total: 2, completed: 2, failed: 0, skipped: 0, pending: 0, truncated: 0 }
    });
    expect(keys()).toEqual(["1", "2", "3", "4"]);
    expect(calls.close).toBe(1);
    expect(loggedEvents(logSpy)).toContainEqual(
      expect.objectContaining({ event: "crawl.source_completed", source: "test-source", duplicates: 1 })
    );
  });

  it("skips partitions completed in an earlier run", async () => {
    const store = createInMemoryCheckpoints();
    const { sink } = createInMemorySink();
    const partitions = { fruit: [{ id: 1 }], bread: [{ id: 2 }] };

    await crawlSource({
      connector: createScriptedConnector({ partitions }).connector,
      sink,
      checkpoints: store.checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });
    const second = createScriptedConnector({ partitions });
    const report = await crawlSource({
      connector: second.connector,
      sink,
      checkpoints: store.checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(second.requests).toHaveLength(0);
    expect(report.totalRecords).toBe(0);
    expect(report.partitions).toEqual({ total: 2, completed: 0, failed: 0, skipped: 2, pending: 0, truncated: 0 });
  });

  it("starts from empty state when the checkpoint is corrupt", async () => {
    const checkpoints: CheckpointStore = {
      ...createInMemoryCheckpoints().checkpoints,
      load: async () => {
        throw new CorruptStateError("Checkpoint data/test/checkpoint.json is not valid JSON", {
          path: "data/test/checkpoint.json"
        });
      }
    };
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.status).toBe("success");
    expect(report.totalRecords).toBe(1);
    expect(loggedEvents(warnSpy)).toContainEqual({
      event: "crawl.checkpoint_corrupt",
      source: "test-source",
      reason: "Checkpoint data/test/checkpoint.json is not valid JSON",
      path: "data/test/checkpoint.json"
    });
  });

  it("treats a checkpoint of another source as corrupt", async () => {
    const store = createInMemoryCheckpoints({
      version: 1,
      source: "other-source",
      seenKeys: ["1"],
      partitions: {},
      updatedAt: "2026-01-01T00:00:00.000Z"
    });
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints: store.checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.totalRecords).toBe(1);
    expect(loggedEvents(warnSpy)).toContainEqual(
      expect.objectContaining({
        event: "crawl.checkpoint_corrupt",
        reason: 'Checkpoint could not be restored: Checkpoint belongs to source "other-source", not "test-source"'
      })
    );
  });

  it("unions keys already in the sink into the seen set", async () => {
    const { sink, keys } = createInMemorySink([{ key: "1", record: { id: 1 }, sourceMetadata: {} }]);
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }, { id: 2 }] } });

    const report = await crawlSource({
      connector,
      sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.totalRecords).toBe(1);
    expect(keys()).toEqual(["1", "2"]);
    expect(loggedEvents(warnSpy)).toContainEqual({ event: "crawl.state_reconciled", source: "test-source", keysAdded: 1 });
  });

  it("reports failure when authentication is rejected", async () => {
    const { connector, requests } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });
    connector.authenticate = async () => {
      throw new FatalAuthError("test-source request failed: 401");
    };
    const { sink, calls } = createInMemorySink();

    const report = await crawlSource({
      connector,
      sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report).toEqual({
      totalRecords: 0,
      status: "failed",
      partitions: { total: 0, completed: 0, failed: 0, skipped: 0, pending: 0, truncated: 0 },
      error: { code: "fatal_auth", message: "test-source request failed: 401" }
    });
    expect(requests).toHaveLength(0);
    expect(calls.close).toBe(1);
    expect(eventNames(errorSpy)).toEqual(["crawl.source_failed"]);
  });

  it("retries a transient partition listing failure", async () => {
    let listCalls = 0;
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });
    const listPartitions = connector.listPartitions.bind(connector);
    connector.listPartitions = async () => {
      listCalls += 1;
      if (listCalls === 1) throw new TransientFetchError("test-source request failed: 502");
      return listPartitions();
    };

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.status).toBe("success");
    expect(listCalls).toBe(2);
    expect(loggedEvents(warnSpy)).toContainEqual(
      expect.objectContaining({ event: "crawl.retry", operation: "listPartitions", attempt: 1 })
    );
  });

  it("keeps going after a failed partition and counts it", async () => {
    const { connector } = createScriptedConnector({
      partitions: { fruit: [{ id: 1 }], bread: [{ id: 2 }] },
      script: [new Error("fruit listing broke")]
    });

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.status).toBe("success");
    expect(report.totalRecords).toBe(1);
    expect(report.partitions).toEqual({ total: 2, completed: 1, failed: 1, skipped: 0, pending: 0, truncated: 0 });
  });

  it("reports an interrupted run as failed", async () => {
    const controller = new AbortController();
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }, { id: 2 }, { id: 3 }] } });

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      signal: controller.signal,
      sleepFn: async () => {
        controller.abort();
      }
    });

    expect(report).toEqual({
      totalRecords: 2,
      status: "failed",
      partitions: { total: 1, completed: 0, failed: 0, skipped: 0, pending: 1, truncated: 0 },
      error: { code: "interrupted", message: "run was interrupted" }
    });
  });

  it("reports an interruption during partition listing as interrupted", async () => {
    const controller = new AbortController();
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });
    connector.listPartitions = async () => {
      controller.abort();
      throw new Error("This operation was aborted");
    };

    const report = await crawlSource({
      connector,
      sink: createInMemorySink().sink,
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      signal: controller.signal,
      sleepFn: noSleep
    });

    expect(report).toEqual({
      totalRecords: 0,
      status: "failed",
      partitions: { total: 0, completed: 0, failed: 0, skipped: 0, pending: 0, truncated: 0 },
      error: { code: "interrupted", message: "run was interrupted" }
    });
  });

  it("logs and absorbs a sink close failure", async () => {
    const { connector } = createScriptedConnector({ partitions: { fruit: [{ id: 1 }] } });
    const { sink } = createInMemorySink();

    const report = await crawlSource({
      connector,
      sink: { ...sink, close: async () => Promise.reject(new Error("socket closed")) },
      checkpoints: createInMemoryCheckpoints().checkpoints,
      config: fastConfig,
      sleepFn: noSleep
    });

    expect(report.status).toBe("success");
    expect(loggedEvents(warnSpy)).toContainEqual({
      event: "crawl.sink_close_failed",
      source: "test-source",
      reason: "socket closed"
    });
  });
});

describe("crawlSource with file stores", () => {
  let dir: string;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "crawl-source-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  const runOnce = () =>
    crawlSource({
      connector: createScriptedConnector({ partitions: { fruit: [{ id: 1 }, { id: 2 }, { id: 3 }] } }).connector,
      sink: new JsonlRecordSink(path.join(dir, "records.jsonl"), "test-source"),
      checkpoints: new JsonFileCheckpointStore(path.join(dir, "checkpoint.json"), "test-source"),
      config: fastConfig,
      sleepFn: noSleep
    });

  it("crawls everything again when the record store had to be discarded", async () => {
    const recordsPath = path.join(dir, "records.jsonl");
    await runOnce();
    const lines = (await readFile(recordsPath, "utf-8")).split("\n");
    lines[1] = "{garbage";
    await writeFile(recordsPath, lines.join("\n"), "utf-8");

    const report = await runOnce();

    expect(report).toEqual({
      totalRecords: 3,
      status: "success",
      partitions: { total: 1, completed: 1, failed: 0, skipped: 0, pending: 0, truncated: 0 }
    });
    const stored = await new JsonlRecordSink(recordsPath, "test-source").readAll();
    expect(stored.map((envelope) => envelope.key)).toEqual(["1", "2", "3"]);
    expect(loggedEvents(warnSpy)).toContainEqual({ event: "crawl.state_discarded", source: "test-source" });
  });
});
