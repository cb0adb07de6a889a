// src/types/records.ts
import type {
  ACTIVITY_DURATIONS,
  ACTIVITY_TYPES,
  APPOINTMENT_STATUSES,
  DEPARTMENTS,
  GENDERS,
  PATIENT_STATUSES,
  PRIORITIES,
  SERVICE_TYPES,
  SPECIALIZATIONS,
} from "../schema/choices.js";
import type { EntityKind } from "./schema.js";
import type { FieldValues, StorageId } from "./store.js";

export type Gender = (typeof GENDERS)[number];
export type PatientStatus = (typeof PATIENT_STATUSES)[number];
export type Specialization = (typeof SPECIALIZATIONS)[number];
export type Department = (typeof DEPARTMENTS)[number];
export type ServiceType = (typeof SERVICE_TYPES)[number];
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];
export type ActivityType = (typeof ACTIVITY_TYPES)[number];
export type ActivityDuration = (typeof ACTIVITY_DURATIONS)[number];
export type Priority = (typeof PRIORITIES)[number];

// Computed fields (FullName, Title) are absent: the store derives them.

export type PatientFields = {
  PatientID: string;
  FirstName: string;
  LastName: string;
  DateOfBirth: Date;
  Gender: Gender;
  ContactNumber: string;
  Email: string;
  Address: string;
  MedicalHistory: string;
  Status: PatientStatus;
};

export type DoctorFields = {
  DoctorID: string;
  FirstName: string;
  LastName: string;
  Specialization: Specialization;
  Email: string;
  Department: Department;
};

export type AppointmentFields = {
  AppointmentID: string;
  StartTime: Date;
  EndTime: Date;
  ServiceType: ServiceType;
  Status: AppointmentStatus;
  IsUrgent: boolean;
  Notes: string;
};

export type ActivityFields = {
  ActivityID: string;
  ActivityDateTime: Date;
  ActivityType: ActivityType;
  Notes: string;
  DurationMinutes: ActivityDuration;
  Priority: Priority;
};

/** A reference field whose storage identifier is resolved at ingestion time. */
export type ReferenceLink = {
  field: string;
  target: EntityKind;
  businessId: string;
};

/** A synthesized record, ready for ingestion once its links are resolved. */
export type RecordDraft = {
  kind: EntityKind;
  businessId: string;
  title: string;
  values: FieldValues;
  links: ReferenceLink[];
};

/** A record read back from the store, reduced to what dependents need. */
export type PersistedEntry = {
  storageId: StorageId;
  businessId: string;
  display: string;
};
