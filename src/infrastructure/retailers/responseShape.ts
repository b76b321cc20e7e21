import type { CatalogRecord } from "../../core/catalog/catalog.types";
import type { Cursor } from "../../core/crawl/cursor";
import { InvalidRecordError, MalformedResponseError } from "../../core/crawl/crawl.errors";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Walks `path` from `value`, failing with MalformedResponseError naming the first missing segment.
 */
export const readPath = (value: unknown, path: string[], source: string): unknown => {
  let current = value;
  for (const [index, segment] of path.entries()) {
    if (!isRecord(current) || !(segment in current)) {
      throw new MalformedResponseError(
        `${source} response is missing "${path.slice(0, index + 1).join(".")}"`,
        { source }
      );
    }
    current = current[segment];
  }
  return current;
};

export const readArray = (value: unknown, path: string[], source: string): unknown[] => {
  const found = path.length === 0 ? value : readPath(value, path, source);
  if (!Array.isArray(found)) {
    throw new MalformedResponseError(`${source} response field "${path.join(".") || "<root>"}" is not an array`, { source });
  }
  return found;
};

export const readRecords = (value: unknown, path: string[], source: string): CatalogRecord[] =>
  readArray(value, path, source).map((item, index) => {
    if (!isRecord(item)) {
      throw new MalformedResponseError(`${source} item ${index} under "${path.join(".")}" is not an object`, { source });
    }
    return item;
  });

export const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

/** Accepts non-empty strings and safe integers as identifiers; returns them as strings. */
export const identifierOf = (value: unknown): string | undefined => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) return String(value);
  return undefined;
};

export const requireKey = (record: CatalogRecord, field: string, source: string): string => {
  const key = identifierOf(record[field]);
  if (key == null) {
    throw new InvalidRecordError(`${source} record has no usable "${field}"`, { source });
  }
  return key;
};

export const offsetOf = (cursor: Cursor | null, source: string): number => {
  if (cursor == null) return 0;
  if (cursor.kind !== "offset") {
    throw new Error(`${source} paginates by offset, got a ${cursor.kind} cursor`);
  }
  return cursor.offset;
};

export const pageOf = (cursor: Cursor | null, firstPage: number, source: string): number => {
  if (cursor == null) return firstPage;
  if (cursor.kind !== "page") {
    throw new Error(`${source} paginates by page number, got a ${cursor.kind} cursor`);
  }
  return cursor.page;
};
