// src/core/ingest.ts
import type { RecordDraft } from "../types/records.js";
import type { CollectionSpec } from "../types/schema.js";
import type { FieldValues, Store } from "../types/store.js";
import { dependencyOrder } from "../util/toposort.js";
import { errorMessage } from "./errors.js";
import type { ResolvedIds } from "./resolve.js";

export type IngestFailure = {
  businessId: string;
  title: string;
  reason: string;
};

export type IngestReport = {
  collection: string;
  attempted: number;
  created: number;
  failures: IngestFailure[];
};

/**
 * Create each draft as its own record. References are resolved just before
 * the create; a record that fails to resolve or is rejected by the store is
 * logged and counted, and the batch moves on.
 */
export async function ingestRecords(
  store: Store,
  spec: CollectionSpec,
  drafts: readonly RecordDraft[],
  resolved: ResolvedIds,
): Promise<IngestReport> {
  const report: IngestReport = {
    collection: spec.name,
    attempted: drafts.length,
    created: 0,
    failures: [],
  };

  console.error(`📥 Ingesting ${drafts.length} ${spec.name}...`);

  for (const draft of drafts) {
    try {
      const values: FieldValues = { ...draft.values };
      for (const link of draft.links) {
        values[link.field] = resolved.resolve(link.target, link.businessId);
      }
      await store.createRecord(spec.name, values);
      report.created++;
    } catch (error) {
      const reason = errorMessage(error);
      console.error(
        `⚠️  Failed to create ${spec.name} record ${draft.businessId} "${draft.title}": ${reason}`,
      );
      report.failures.push({
        businessId: draft.businessId,
        title: draft.title,
        reason,
      });
    }
  }

  const icon = report.failures.length === 0 ? "✅" : "⚠️ ";
  console.error(
    `${icon} ${spec.name}: ${report.created}/${report.attempted} created`,
  );
  return report;
}

/**
 * Delete every record of every existing collection, referrers before the
 * collections they point at. Returns the number deleted per collection.
 */
export async function clearExistingData(
  store: Store,
  collections: readonly CollectionSpec[],
): Promise<Record<string, number>> {
  const deleted: Record<string, number> = {};

  for (const spec of dependencyOrder(collections).reverse()) {
    if (!(await store.collectionExists(spec.name))) {
      console.error(`   ${spec.name} does not exist, nothing to clear`);
      continue;
    }
    const records = await store.listRecords(spec.name);
    console.error(`🧹 Clearing ${records.length} ${spec.name}...`);
    for (const record of records) {
      await store.deleteRecord(spec.name, record.storageId);
    }
    deleted[spec.name] = records.length;
  }

  return deleted;
}
