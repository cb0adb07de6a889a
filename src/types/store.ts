// src/types/store.ts
import type { FieldSpec } from "./schema.js";

export type StorageId = number;

export type FieldValue = string | number | boolean | Date | null;

export type FieldValues = Record<string, FieldValue>;

export type StoredRecord = {
  storageId: StorageId;
  values: FieldValues;
};

/**
 * The structured-list store that collections and records are written to.
 * Every operation is attempted once; failures propagate to the caller.
 */
export interface Store {
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  addField(collection: string, field: FieldSpec): Promise<void>;
  /** Throws ValidationError when a required, choice, unique or reference constraint fails. */
  createRecord(collection: string, values: FieldValues): Promise<StorageId>;
  /** Records ordered by storage identifier. */
  listRecords(collection: string): Promise<StoredRecord[]>;
  deleteRecord(collection: string, storageId: StorageId): Promise<void>;
  close(): Promise<void>;
}
