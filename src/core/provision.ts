// src/core/provision.ts
import type { CollectionSpec, FieldSpec } from "../types/schema.js";
import type { Store } from "../types/store.js";
import { formulaDependencies } from "../schema/formula.js";
import { dependencyOrder } from "../util/toposort.js";
import { SetupFailure, errorMessage } from "./errors.js";

export type ProvisionStep = "check" | "drop" | "create" | "add-fields" | "ready";

export type ProvisionResult = {
  collection: string;
  recreated: boolean;
  fields: string[];
};

const FIELD_PHASE: Record<FieldSpec["kind"], number> = {
  scalar: 1,
  choice: 1,
  computed: 2,
  reference: 3,
};

/**
 * Order a collection's fields for creation: the business identifier, then
 * scalar and choice fields, then computed fields, then reference fields.
 * Throws if a computed field reads a field that would not exist yet.
 */
export function fieldCreationOrder(spec: CollectionSpec): FieldSpec[] {
  const businessId = spec.fields.find((f) => f.name === spec.businessIdField);
  if (!businessId || businessId.kind !== "scalar") {
    throw new Error(
      `${spec.name}: business identifier ${spec.businessIdField} must be a declared scalar field`,
    );
  }

  const rest = spec.fields
    .filter((f) => f !== businessId)
    .map((field, index) => ({ field, index }))
    .sort(
      (a, b) =>
        FIELD_PHASE[a.field.kind] - FIELD_PHASE[b.field.kind] ||
        a.index - b.index,
    )
    .map(({ field }) => field);
  const ordered = [businessId, ...rest];

  ordered.forEach((field, position) => {
    if (field.kind !== "computed") return;
    const earlier = new Set(ordered.slice(0, position).map((f) => f.name));
    for (const dep of formulaDependencies(field)) {
      if (!earlier.has(dep)) {
        throw new Error(
          `${spec.name}: computed field ${field.name} reads ${dep}, which is not declared before it`,
        );
      }
    }
  });

  return ordered;
}

/**
 * Ensure one collection exists with exactly the declared fields. An existing
 * collection is dropped with all of its records and created again.
 */
export async function provisionCollection(
  store: Store,
  spec: CollectionSpec,
): Promise<ProvisionResult> {
  let step: ProvisionStep = "check";
  const added: string[] = [];

  try {
    const fields = fieldCreationOrder(spec);

    const exists = await store.collectionExists(spec.name);
    if (exists) {
      step = "drop";
      console.error(`   ${spec.name} exists, recreating it`);
      await store.deleteCollection(spec.name);
    }

    step = "create";
    await store.createCollection(spec.name);

    step = "add-fields";
    for (const field of fields) {
      await store.addField(spec.name, field);
      added.push(field.name);
    }

    step = "ready";
    return { collection: spec.name, recreated: exists, fields: added };
  } catch (error) {
    const progress =
      step === "add-fields" ? ` (after ${added.length} fields)` : "";
    throw new SetupFailure(
      `Provisioning ${spec.name} failed at step "${step}"${progress}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Provision every collection, reference targets first.
 */
export async function provisionCollections(
  store: Store,
  collections: readonly CollectionSpec[],
): Promise<ProvisionResult[]> {
  const results: ProvisionResult[] = [];
  for (const spec of dependencyOrder(collections)) {
    console.error(`🔧 Provisioning ${spec.name}...`);
    const result = await provisionCollection(store, spec);
    console.error(`✅ ${spec.name}: ${result.fields.length} fields`);
    results.push(result);
  }
  return results;
}

/**
 * With auto-provisioning off, every collection must already exist.
 */
export async function assertCollectionsExist(
  store: Store,
  collections: readonly CollectionSpec[],
): Promise<void> {
  const missing: string[] = [];
  for (const spec of collections) {
    if (!(await store.collectionExists(spec.name))) missing.push(spec.name);
  }
  if (missing.length > 0) {
    throw new SetupFailure(
      `Missing collections: ${missing.join(", ")}. Run with provisioning enabled to create them.`,
    );
  }
}
