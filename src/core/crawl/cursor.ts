export type OffsetCursor = {
  kind: "offset";
  offset: number;
  limit: number;
};

export type PageCursor = {
  kind: "page";
  page: number;
  pageSize: number;
};

export type TokenCursor = {
  kind: "token";
  token: string;
};

export type Cursor = OffsetCursor | PageCursor | TokenCursor;

export const sameCursor = (a: Cursor | null, b: Cursor | null): boolean => {
  if (a == null || b == null) return a == null && b == null;
  switch (a.kind) {
    case "offset":
      return b.kind === "offset" && a.offset === b.offset && a.limit === b.limit;
    case "page":
      return b.kind === "page" && a.page === b.page && a.pageSize === b.pageSize;
    case "token":
      return b.kind === "token" && a.token === b.token;
  }
};

export const describeCursor = (cursor: Cursor | null): string => {
  if (cursor == null) return "start";
  switch (cursor.kind) {
    case "offset":
      return `offset=${cursor.offset}`;
    case "page":
      return `page=${cursor.page}`;
    case "token":
      return `token=${cursor.token}`;
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

export const parseCursor = (value: unknown): Cursor | null | undefined => {
  if (value === null) return null;
  if (!isRecord(value)) return undefined;

  if (value.kind === "offset" && isNonNegativeInteger(value.offset) && isNonNegativeInteger(value.limit)) {
    return { kind: "offset", offset: value.offset, limit: value.limit };
  }
  if (value.kind === "page" && isNonNegativeInteger(value.page) && isNonNegativeInteger(value.pageSize)) {
    return { kind: "page", page: value.page, pageSize: value.pageSize };
  }
  if (value.kind === "token" && typeof value.token === "string") {
    return { kind: "token", token: value.token };
  }
  return undefined;
};
