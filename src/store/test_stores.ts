// src/store/test_stores.ts
import type { FieldValues, StorageId } from "../types/store.js";
import { MemoryStore } from "./memory_store.js";

/** Fails the nth create of one collection, as a flaky store would. */
export class FailingStore extends MemoryStore {
  private creates = 0;

  constructor(
    private readonly collection: string,
    private readonly failOn: number,
  ) {
    super();
  }

  override async createRecord(collection: string, values: FieldValues): Promise<StorageId> {
    if (collection === this.collection && ++this.creates === this.failOn) {
      throw new Error("connection reset");
    }
    return super.createRecord(collection, values);
  }
}

/** Records the collection of every deleted record, in order. */
export class RecordingStore extends MemoryStore {
  readonly deletions: string[] = [];

  override async deleteRecord(collection: string, storageId: StorageId): Promise<void> {
    this.deletions.push(collection);
    return super.deleteRecord(collection, storageId);
  }
}
