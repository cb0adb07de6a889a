// src/core/synthesize.ts
import { faker } from "@faker-js/faker";
import type { RNG } from "../types/rng.js";
import type { RunConfig } from "../types/run-config.js";
import type { ValuePools } from "../types/pools.js";
import type { CollectionSpec, EntityKind } from "../types/schema.js";
import type { FieldValues } from "../types/store.js";
import type {
  ActivityFields,
  AppointmentFields,
  AppointmentStatus,
  DoctorFields,
  PatientFields,
  PersistedEntry,
  RecordDraft,
  ReferenceLink,
} from "../types/records.js";
import {
  ACTIVITY_DURATIONS,
  ACTIVITY_TYPES,
  DEPARTMENTS,
  FUTURE_APPOINTMENT_STATUSES,
  GENDERS,
  PAST_APPOINTMENT_STATUSES,
  PATIENT_STATUSES,
  PRIORITIES,
  SERVICE_TYPES,
  SPECIALIZATIONS,
} from "../schema/choices.js";
import {
  ACTIVITIES,
  APPOINTMENTS,
  DOCTORS,
  PATIENTS,
} from "../schema/collections.js";
import { evaluateFormula } from "../schema/formula.js";
import { createRng, randomInt, randomPick } from "../util/rng.js";
import { formatBusinessId } from "./identifiers.js";
import {
  addDays,
  addMinutes,
  addYears,
  parseCalendarDate,
  sampleBusinessHourDateTime,
  sampleDateTime,
} from "./temporal.js";
import { EmptySourceError } from "./errors.js";

export type SynthesisContext = {
  rng: RNG;
  // Reference point for ages, appointment windows and past/future status
  now: Date;
  config: RunConfig;
  pools: ValuePools;
};

/**
 * Build a synthesis context. Faker is seeded with the same seed so a run
 * with a fixed seed and clock is reproducible.
 */
export function createSynthesisContext(
  config: RunConfig,
  pools: ValuePools,
  seed: number,
  now: Date = new Date(),
): SynthesisContext {
  faker.seed(seed);
  return { rng: createRng(seed), now, config, pools };
}

/**
 * Cyclic selection: the item at `index` modulo the source length.
 */
export function roundRobin<T>(source: readonly T[], index: number): T {
  const item = source[index % source.length];
  if (item === undefined) {
    throw new Error("Cannot cycle over an empty source");
  }
  return item;
}

function requireSource(
  dependent: EntityKind,
  source: EntityKind,
  entries: readonly PersistedEntry[],
): void {
  if (entries.length === 0) {
    throw new EmptySourceError(dependent, source);
  }
}

/**
 * Past appointments draw from the closed-out statuses, the rest from the
 * open ones.
 */
export function sampleAppointmentStatus(
  rng: RNG,
  start: Date,
  now: Date,
): AppointmentStatus {
  return start.getTime() < now.getTime()
    ? randomPick(rng, PAST_APPOINTMENT_STATUSES)
    : randomPick(rng, FUTURE_APPOINTMENT_STATUSES);
}

function displayTitle(spec: CollectionSpec, values: FieldValues): string {
  const field = spec.fields.find((f) => f.name === spec.titleField);
  if (field?.kind === "computed") {
    return evaluateFormula(field.formula, values);
  }
  return String(values[spec.titleField] ?? "");
}

function toDraft(
  spec: CollectionSpec,
  values: FieldValues,
  links: ReferenceLink[],
): RecordDraft {
  const businessId = values[spec.businessIdField];
  if (typeof businessId !== "string") {
    throw new Error(`${spec.name} draft has no ${spec.businessIdField}`);
  }
  return {
    kind: spec.kind,
    businessId,
    title: displayTitle(spec, values),
    values,
    links,
  };
}

function contactNumber(rng: RNG): string {
  const exchange = randomInt(rng, 200, 999);
  const line = String(randomInt(rng, 0, 9999)).padStart(4, "0");
  return `(555) ${exchange}-${line}`;
}

// ---------------------------------------------------------------------------
// Phase A: records without references
// ---------------------------------------------------------------------------

export function generatePatients(ctx: SynthesisContext): RecordDraft[] {
  const { rng, pools, now } = ctx;
  const { minAgeYears, maxAgeYears } = ctx.config.patients;
  const bornFrom = addYears(now, -maxAgeYears);
  const bornTo = addYears(now, -minAgeYears);
  const drafts: RecordDraft[] = [];

  for (let i = 1; i <= ctx.config.counts.patients; i++) {
    const firstName = randomPick(rng, pools.firstNames);
    const lastName = randomPick(rng, pools.lastNames);
    const fields: PatientFields = {
      PatientID: formatBusinessId("patient", i),
      FirstName: firstName,
      LastName: lastName,
      DateOfBirth: sampleBusinessHourDateTime(rng, bornFrom, bornTo),
      Gender: randomPick(rng, GENDERS),
      ContactNumber: contactNumber(rng),
      Email: `${firstName}.${lastName}@example.com`.toLowerCase(),
      Address: faker.location.streetAddress(true),
      MedicalHistory: randomPick(rng, pools.medicalHistories),
      Status: randomPick(rng, PATIENT_STATUSES),
    };
    drafts.push(toDraft(PATIENTS, fields, []));
  }

  return drafts;
}

export function generateDoctors(ctx: SynthesisContext): RecordDraft[] {
  const { rng, pools } = ctx;
  const drafts: RecordDraft[] = [];

  for (let i = 1; i <= ctx.config.counts.doctors; i++) {
    const firstName = randomPick(rng, pools.firstNames);
    const lastName = randomPick(rng, pools.lastNames);
    const fields: DoctorFields = {
      DoctorID: formatBusinessId("doctor", i),
      FirstName: firstName,
      LastName: lastName,
      Specialization: randomPick(rng, SPECIALIZATIONS),
      Email: `dr.${firstName}.${lastName}@clinic.example`.toLowerCase(),
      Department: randomPick(rng, DEPARTMENTS),
    };
    drafts.push(toDraft(DOCTORS, fields, []));
  }

  return drafts;
}

// ---------------------------------------------------------------------------
// Phase B: records that reference persisted ones
// ---------------------------------------------------------------------------

/**
 * Appointments cycle over the persisted patients and doctors, so with at
 * least as many appointments as patients every patient is booked once.
 */
export function generateAppointments(
  ctx: SynthesisContext,
  patients: readonly PersistedEntry[],
  doctors: readonly PersistedEntry[],
): RecordDraft[] {
  requireSource("appointment", "patient", patients);
  requireSource("appointment", "doctor", doctors);

  const { rng, now } = ctx;
  const { daysBefore, daysAfter, durationMinutes, urgentOutOfTen } =
    ctx.config.appointments;
  const windowStart = addDays(now, -daysBefore);
  const windowEnd = addDays(now, daysAfter);
  const drafts: RecordDraft[] = [];

  for (let i = 0; i < ctx.config.counts.appointments; i++) {
    const patient = roundRobin(patients, i);
    const doctor = roundRobin(doctors, i);
    const start = sampleDateTime(rng, windowStart, windowEnd);
    const serviceType = randomPick(rng, SERVICE_TYPES);
    const isUrgent = randomInt(rng, 1, 10) <= urgentOutOfTen;

    const fields: AppointmentFields = {
      AppointmentID: formatBusinessId("appointment", i + 1),
      StartTime: start,
      EndTime: addMinutes(start, durationMinutes),
      ServiceType: serviceType,
      Status: sampleAppointmentStatus(rng, start, now),
      IsUrgent: isUrgent,
      Notes:
        `${serviceType} for ${patient.display} with ${doctor.display}.` +
        (isUrgent ? " Marked urgent." : ""),
    };
    drafts.push(
      toDraft(APPOINTMENTS, fields, [
        { field: "Patient", target: "patient", businessId: patient.businessId },
        { field: "Doctor", target: "doctor", businessId: doctor.businessId },
      ]),
    );
  }

  return drafts;
}

/**
 * Activities cycle over appointments, patients and doctors with independent
 * cursors that share the loop index.
 */
export function generateActivities(
  ctx: SynthesisContext,
  appointments: readonly PersistedEntry[],
  patients: readonly PersistedEntry[],
  doctors: readonly PersistedEntry[],
): RecordDraft[] {
  requireSource("activity", "appointment", appointments);
  requireSource("activity", "patient", patients);
  requireSource("activity", "doctor", doctors);

  const { rng } = ctx;
  const windowStart = parseCalendarDate(ctx.config.activities.from);
  const windowEnd = parseCalendarDate(ctx.config.activities.to);
  const drafts: RecordDraft[] = [];

  for (let i = 0; i < ctx.config.counts.activities; i++) {
    const appointment = roundRobin(appointments, i);
    const patient = roundRobin(patients, i);
    const doctor = roundRobin(doctors, i);
    const activityType = randomPick(rng, ACTIVITY_TYPES);
    const priority = randomPick(rng, PRIORITIES);
    const duration = randomPick(rng, ACTIVITY_DURATIONS);

    const fields: ActivityFields = {
      ActivityID: formatBusinessId("activity", i + 1),
      ActivityDateTime: sampleBusinessHourDateTime(rng, windowStart, windowEnd),
      ActivityType: activityType,
      Notes:
        `${activityType} for ${patient.display} by ${doctor.display}: ` +
        `${duration} minutes, ${priority.toLowerCase()} priority, ` +
        `linked to ${appointment.businessId}.`,
      DurationMinutes: duration,
      Priority: priority,
    };
    drafts.push(
      toDraft(ACTIVITIES, fields, [
        { field: "Patient", target: "patient", businessId: patient.businessId },
        { field: "Doctor", target: "doctor", businessId: doctor.businessId },
        {
          field: "Appointment",
          target: "appointment",
          businessId: appointment.businessId,
        },
      ]),
    );
  }

  return drafts;
}
