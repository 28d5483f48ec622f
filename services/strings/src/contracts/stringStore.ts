import type { StringId, StringRecord } from '../types';

/** Defines a pluggable storage backend the string routes rely on. */
export interface StringStore {
  /** Inserts a new record; rejects with `ConflictError` when the id is already stored. */
  put(record: StringRecord): Promise<void>;
  get(id: StringId): Promise<StringRecord | null>;
  /** Resolves `false` when nothing was stored under `id`. */
  delete(id: StringId): Promise<boolean>;
  /** All records, in insertion order. */
  list(): Promise<StringRecord[]>;
  size(): Promise<number>;
}
