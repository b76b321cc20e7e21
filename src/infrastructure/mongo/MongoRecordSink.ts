import { MongoClient, type AnyBulkWriteOperation, type Collection } from "mongodb";
import type { CatalogRecord, RecordEnvelope, RecordKey } from "../../core/catalog/catalog.types";
import type { RecordSink, SinkOpenResult } from "../../ports/RecordSink";
import { mongoIndexes } from "./mongo.indexes";

export type RecordDoc = {
  _id: string;
  key: string;
  seq: number;
  record: CatalogRecord;
  sourceMetadata: Record<string, string>;
  acceptedAt: Date;
};

/**
 * Keeps the first envelope seen for each key; later repeats inside the same batch are dropped.
 */
export const dedupeEnvelopesByKey = (envelopes: RecordEnvelope[]): RecordEnvelope[] => {
  const byKey = new Map<RecordKey, RecordEnvelope>();
  for (const envelope of envelopes) {
    if (!byKey.has(envelope.key)) byKey.set(envelope.key, envelope);
  }
  return Array.from(byKey.values());
};

/**
 * Record sink backed by one Mongo collection per source. Inserts go through `$setOnInsert`
 * upserts keyed by record key, so a key already stored is never written twice.
 */
export class MongoRecordSink implements RecordSink {
  private client?: MongoClient;
  private collection?: Collection<RecordDoc>;
  private nextSeq = 0;

  constructor(
    private readonly mongoUri: string,
    private readonly collectionName: string,
    private readonly dbName = "catalog"
  ) {}

  private async getCollection(): Promise<Collection<RecordDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<RecordDoc>(this.collectionName);
    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async open(): Promise<SinkOpenResult> {
    const col = await this.getCollection();
    const docs = await col.find({}, { projection: { key: 1, seq: 1 } }).sort({ seq: 1 }).toArray();
    const last = docs[docs.length - 1];
    this.nextSeq = last ? last.seq + 1 : 0;
    return { committedKeys: docs.map((doc) => doc.key), discarded: false };
  }

  async append(envelopes: RecordEnvelope[]): Promise<{ appended: number }> {
    const unique = dedupeEnvelopesByKey(envelopes);
    if (unique.length === 0) {
      return { appended: 0 };
    }

    const col = await this.getCollection();
    const acceptedAt = new Date();
    const ops: AnyBulkWriteOperation<RecordDoc>[] = unique.map((envelope, index) => ({
      updateOne: {
        filter: { _id: envelope.key },
        update: {
          $setOnInsert: {
            key: envelope.key,
            seq: this.nextSeq + index,
            record: envelope.record,
            sourceMetadata: envelope.sourceMetadata,
            acceptedAt
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: true });
    this.nextSeq += unique.length;
    return { appended: res.upsertedCount ?? 0 };
  }

  async reset(): Promise<void> {
    const col = await this.getCollection();
    await col.deleteMany({});
    this.nextSeq = 0;
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
