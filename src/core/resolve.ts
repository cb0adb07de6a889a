// src/core/resolve.ts
import type { PersistedEntry } from "../types/records.js";
import type { CollectionSpec, EntityKind } from "../types/schema.js";
import type { StorageId, Store } from "../types/store.js";
import { ResolutionError } from "./errors.js";

/**
 * Records of one kind as read back from the store, in storage order,
 * with a lookup from business identifier to storage identifier.
 */
export type PersistedSet = {
  kind: EntityKind;
  entries: PersistedEntry[];
  lookup: Map<string, StorageId>;
};

/**
 * List a collection and index it by business identifier. A record without
 * a business identifier, or two records sharing one, is an error.
 */
export async function readPersisted(
  store: Store,
  spec: CollectionSpec,
): Promise<PersistedSet> {
  const records = await store.listRecords(spec.name);
  const entries: PersistedEntry[] = [];
  const lookup = new Map<string, StorageId>();

  for (const record of records) {
    const businessId = record.values[spec.businessIdField];
    if (typeof businessId !== "string" || businessId === "") {
      throw new Error(
        `${spec.name} record ${record.storageId} has no ${spec.businessIdField}`,
      );
    }
    if (lookup.has(businessId)) {
      throw new Error(
        `${spec.name} holds more than one record with ${spec.businessIdField} ${businessId}`,
      );
    }
    lookup.set(businessId, record.storageId);

    const display = record.values[spec.titleField];
    entries.push({
      storageId: record.storageId,
      businessId,
      display: typeof display === "string" && display ? display : businessId,
    });
  }

  return { kind: spec.kind, entries, lookup };
}

/**
 * Business identifier -> storage identifier maps for every persisted kind,
 * passed forward from one synthesis stage to the next.
 */
export class ResolvedIds {
  private constructor(
    private readonly maps: ReadonlyMap<EntityKind, ReadonlyMap<string, StorageId>>,
  ) {}

  static empty(): ResolvedIds {
    return new ResolvedIds(new Map());
  }

  /** A copy that also knows the given set's identifiers. */
  with(set: PersistedSet): ResolvedIds {
    const maps = new Map(this.maps);
    maps.set(set.kind, set.lookup);
    return new ResolvedIds(maps);
  }

  resolve(kind: EntityKind, businessId: string): StorageId {
    const storageId = this.maps.get(kind)?.get(businessId);
    if (storageId === undefined) {
      throw new ResolutionError(kind, businessId);
    }
    return storageId;
  }
}
