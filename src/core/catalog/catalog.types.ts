export type RecordKey = string;

export type CatalogRecord = Record<string, unknown>;

/**
 * What a sink persists for every accepted record. Source-side context (the category a product
 * was listed under, the partition path) travels in `sourceMetadata`, never inside `record`.
 */
export type RecordEnvelope = {
  key: RecordKey;
  record: CatalogRecord;
  sourceMetadata: Record<string, string>;
};

export type Partition = {
  id: string;
  label: string;
  path: string[];   // labels from the root category down to this one
};

export type ProductRef =
  | { kind: "id"; id: string }
  | { kind: "full"; record: CatalogRecord };

export const productRefById = (id: string): ProductRef => ({ kind: "id", id });

export const productRefOf = (record: CatalogRecord): ProductRef => ({ kind: "full", record });

export const resolveProductId = (ref: ProductRef, keyOf: (record: CatalogRecord) => RecordKey): string => {
  switch (ref.kind) {
    case "id":
      return ref.id;
    case "full":
      return keyOf(ref.record);
  }
};
