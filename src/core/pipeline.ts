// src/core/pipeline.ts
import type { RunConfig } from "../types/run-config.js";
import type { ValuePools } from "../types/pools.js";
import type { RecordDraft } from "../types/records.js";
import type { CollectionSpec } from "../types/schema.js";
import type { Store } from "../types/store.js";
import {
  ACTIVITIES,
  APPOINTMENTS,
  COLLECTIONS,
  DOCTORS,
  PATIENTS,
} from "../schema/collections.js";
import { EmptySourceError, SetupFailure, errorMessage } from "./errors.js";
import { clearExistingData, ingestRecords, type IngestReport } from "./ingest.js";
import { assertCollectionsExist, provisionCollections } from "./provision.js";
import { ResolvedIds, readPersisted } from "./resolve.js";
import {
  createSynthesisContext,
  generateActivities,
  generateAppointments,
  generateDoctors,
  generatePatients,
} from "./synthesize.js";

export type SeedRunOptions = {
  config: RunConfig;
  pools: ValuePools;
  seed: number;
  now?: Date;
  clear?: boolean;
  provision?: boolean;
};

export type SeedRunSummary = {
  seed: number;
  cleared: Record<string, number> | null;
  reports: IngestReport[];
  // Kinds whose synthesis stopped on an empty reference source
  aborted: Array<{ collection: string; reason: string }>;
};

/**
 * Run one complete seeding pass: optional clear, schema provisioning (or a
 * check that it exists), then each kind in dependency order. Dependent
 * kinds are synthesized from what the store holds after the previous
 * kinds were written, never from the in-memory drafts.
 */
export async function runSeed(
  store: Store,
  options: SeedRunOptions,
): Promise<SeedRunSummary> {
  const { config, pools, seed, clear = false, provision = true } = options;
  const summary: SeedRunSummary = {
    seed,
    cleared: null,
    reports: [],
    aborted: [],
  };

  await setUp(store, COLLECTIONS, { clear, provision }, summary);

  const ctx = createSynthesisContext(config, pools, seed, options.now);
  let resolved = ResolvedIds.empty();

  console.error("🎲 Generating patients and doctors...");
  summary.reports.push(
    await ingestRecords(store, PATIENTS, generatePatients(ctx), resolved),
  );
  summary.reports.push(
    await ingestRecords(store, DOCTORS, generateDoctors(ctx), resolved),
  );

  const patients = await readPersisted(store, PATIENTS);
  const doctors = await readPersisted(store, DOCTORS);
  resolved = resolved.with(patients).with(doctors);

  console.error("🎲 Generating appointments...");
  const appointmentDrafts = synthesizeOrAbort(APPOINTMENTS, summary, () =>
    generateAppointments(ctx, patients.entries, doctors.entries),
  );
  if (appointmentDrafts) {
    summary.reports.push(
      await ingestRecords(store, APPOINTMENTS, appointmentDrafts, resolved),
    );
  }

  const appointments = await readPersisted(store, APPOINTMENTS);
  resolved = resolved.with(appointments);

  console.error("🎲 Generating activities...");
  const activityDrafts = synthesizeOrAbort(ACTIVITIES, summary, () =>
    generateActivities(
      ctx,
      appointments.entries,
      patients.entries,
      doctors.entries,
    ),
  );
  if (activityDrafts) {
    summary.reports.push(
      await ingestRecords(store, ACTIVITIES, activityDrafts, resolved),
    );
  }

  return summary;
}

async function setUp(
  store: Store,
  collections: readonly CollectionSpec[],
  flags: { clear: boolean; provision: boolean },
  summary: SeedRunSummary,
): Promise<void> {
  try {
    if (flags.clear) {
      summary.cleared = await clearExistingData(store, collections);
    }
    if (flags.provision) {
      await provisionCollections(store, collections);
    } else {
      await assertCollectionsExist(store, collections);
    }
  } catch (error) {
    if (error instanceof SetupFailure) throw error;
    throw new SetupFailure(`Store setup failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function synthesizeOrAbort(
  spec: CollectionSpec,
  summary: SeedRunSummary,
  synthesize: () => RecordDraft[],
): RecordDraft[] | null {
  try {
    return synthesize();
  } catch (error) {
    if (!(error instanceof EmptySourceError)) throw error;
    console.error(`❌ ${error.message}`);
    summary.aborted.push({ collection: spec.name, reason: error.message });
    return null;
  }
}
