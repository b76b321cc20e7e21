import type { RecordEnvelope } from "../../src/core/catalog/catalog.types";
import { dedupeEnvelopesByKey, MongoRecordSink } from "../../src/infrastructure/mongo/MongoRecordSink";

const mockStoredDocs: Array<{ key: string; seq: number }> = [];
const mockCollection = {
  createIndex: jest.fn().mockResolvedValue("ok"),
  find: jest.fn(() => ({
    sort: () => ({ toArray: async () => [...mockStoredDocs] })
  })),
  bulkWrite: jest.fn().mockResolvedValue({ upsertedCount: 0 }),
  deleteMany: jest.fn().mockResolvedValue({ deletedCount: 0 })
};
const mockDb = jest.fn(() => ({ collection: jest.fn(() => mockCollection) }));
const mockConnect = jest.fn().mockResolvedValue(undefined);
const mockClose = jest.fn().mockResolvedValue(undefined);

jest.mock("mongodb", () => ({
  MongoClient: jest.fn().mockImplementation(() => ({ connect: mockConnect, db: mockDb, close: mockClose }))
}));

const envelope = (key: string, title = `product ${key}`): RecordEnvelope => ({
  key,
  record: { id: key, title },
  sourceMetadata: { category: "fruit" }
});

describe("MongoRecordSink", () => {
  beforeEach(() => {
    mockStoredDocs.length = 0;
    jest.clearAllMocks();
  });

  it("dedupe helper keeps the first occurrence per key", () => {
    const deduped = dedupeEnvelopesByKey([envelope("1", "first"), envelope("2"), envelope("1", "second")]);

    expect(deduped).toEqual([envelope("1", "first"), envelope("2")]);
  });

  it("returns early for empty batches without connecting", async () => {
    const sink = new MongoRecordSink("mongodb://localhost:27017/catalog", "jumbo_records");

    await expect(sink.append([])).resolves.toEqual({ appended: 0 });
    expect(mockConnect).not.toHaveBeenCalled();
  });

  it("creates indexes once and reports stored keys in acceptance order", async () => {
    mockStoredDocs.push({ key: "a", seq: 0 }, { key: "b", seq: 1 });
    const sink = new MongoRecordSink("mongodb://localhost:27017/catalog", "jumbo_records");

    await expect(sink.open()).resolves.toEqual({ committedKeys: ["a", "b"], discarded: false });
    await sink.open();

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockDb).toHaveBeenCalledWith("catalog");
    expect(mockCollection.createIndex.mock.calls).toEqual([
      [{ key: 1 }, { unique: true }],
      [{ seq: 1 }, {}]
    ]);
  });

  it("inserts with $setOnInsert so stored keys are never overwritten", async () => {
    mockStoredDocs.push({ key: "a", seq: 0 }, { key: "b", seq: 1 });
    mockCollection.bulkWrite.mockResolvedValueOnce({ upsertedCount: 2 });
    const sink = new MongoRecordSink("mongodb://localhost:27017/catalog", "jumbo_records");
    await sink.open();

    await expect(sink.append([envelope("c"), envelope("d"), envelope("c", "repeat")])).resolves.toEqual({ appended: 2 });

    expect(mockCollection.bulkWrite).toHaveBeenCalledTimes(1);
    const [ops, options] = mockCollection.bulkWrite.mock.calls[0];
    expect(options).toEqual({ ordered: true });
    expect(ops).toEqual([
      {
        updateOne: {
          filter: { _id: "c" },
          update: {
            $setOnInsert: {
              key: "c",
              seq: 2,
              record: { id: "c", title: "product c" },
              sourceMetadata: { category: "fruit" },
              acceptedAt: expect.any(Date)
            }
          },
          upsert: true
        }
      },
      {
        updateOne: {
          filter: { _id: "d" },
          update: {
            $setOnInsert: {
              key: "d",
              seq: 3,
              record: { id: "d", title: "product d" },
              sourceMetadata: { category: "fruit" },
              acceptedAt: expect.any(Date)
            }
          },
          upsert: true
        }
      }
    ]);
  });

  it("reset clears the collection and restarts the sequence", async () => {
    mockStoredDocs.push({ key: "a", seq: 0 });
    const sink = new MongoRecordSink("mongodb://localhost:27017/catalog", "jumbo_records");
    await sink.open();

    await sink.reset();
    await sink.append([envelope("z")]);

    expect(mockCollection.deleteMany).toHaveBeenCalledWith({});
    const [ops] = mockCollection.bulkWrite.mock.calls[0];
    expect(ops).toEqual([expect.objectContaining({ updateOne: expect.objectContaining({ filter: { _id: "z" } }) })]);
    expect(JSON.stringify(ops)).toContain('"seq":0');
  });

  it("close disconnects and a later call reconnects", async () => {
    const sink = new MongoRecordSink("mongodb://localhost:27017/catalog", "jumbo_records");
    await sink.open();

    await sink.close();
    await sink.open();

    expect(mockClose).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledTimes(2);
  });
});
