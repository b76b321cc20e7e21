import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for per-source record collections:
 * - unique: { key: 1 } keeps each record key stored once
 * - { seq: 1 } serves reads in acceptance order
 */
export const mongoIndexes: {
  recordCollection: Array<{ keys: IndexSpecification; options: CreateIndexesOptions }>;
} = {
  recordCollection: [
    { keys: { key: 1 }, options: { unique: true } },
    { keys: { seq: 1 }, options: {} }
  ]
};
