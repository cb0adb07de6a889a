// src/schema/collections.ts
import type { CollectionSpec } from "../types/schema.js";
import {
  ACTIVITY_DURATIONS,
  ACTIVITY_TYPES,
  APPOINTMENT_STATUSES,
  DEPARTMENTS,
  GENDERS,
  PATIENT_STATUSES,
  PRIORITIES,
  SERVICE_TYPES,
  SPECIALIZATIONS,
} from "./choices.js";

export const PATIENTS: CollectionSpec = {
  kind: "patient",
  name: "Patients",
  businessIdField: "PatientID",
  titleField: "FullName",
  fields: [
    {
      kind: "scalar",
      name: "PatientID",
      type: "text",
      required: true,
      unique: true,
      indexed: true,
    },
    { kind: "scalar", name: "FirstName", type: "text", required: true },
    { kind: "scalar", name: "LastName", type: "text", required: true },
    { kind: "scalar", name: "DateOfBirth", type: "date", required: true },
    { kind: "choice", name: "Gender", choices: GENDERS, required: true },
    { kind: "scalar", name: "ContactNumber", type: "phone" },
    { kind: "scalar", name: "Email", type: "email" },
    { kind: "scalar", name: "Address", type: "note" },
    { kind: "scalar", name: "MedicalHistory", type: "note" },
    { kind: "choice", name: "Status", choices: PATIENT_STATUSES, required: true },
    {
      kind: "computed",
      name: "FullName",
      formula: [{ field: "FirstName" }, { literal: " " }, { field: "LastName" }],
    },
  ],
};

export const DOCTORS: CollectionSpec = {
  kind: "doctor",
  name: "Doctors",
  businessIdField: "DoctorID",
  titleField: "FullName",
  fields: [
    {
      kind: "scalar",
      name: "DoctorID",
      type: "text",
      required: true,
      unique: true,
      indexed: true,
    },
    { kind: "scalar", name: "FirstName", type: "text", required: true },
    { kind: "scalar", name: "LastName", type: "text", required: true },
    {
      kind: "choice",
      name: "Specialization",
      choices: SPECIALIZATIONS,
      required: true,
    },
    { kind: "scalar", name: "Email", type: "email" },
    { kind: "choice", name: "Department", choices: DEPARTMENTS },
    {
      kind: "computed",
      name: "FullName",
      formula: [
        { literal: "Dr. " },
        { field: "FirstName" },
        { literal: " " },
        { field: "LastName" },
      ],
    },
  ],
};

export const APPOINTMENTS: CollectionSpec = {
  kind: "appointment",
  name: "Appointments",
  businessIdField: "AppointmentID",
  titleField: "AppointmentID",
  fields: [
    {
      kind: "scalar",
      name: "AppointmentID",
      type: "text",
      required: true,
      unique: true,
      indexed: true,
    },
    { kind: "scalar", name: "StartTime", type: "datetime", required: true },
    { kind: "scalar", name: "EndTime", type: "datetime", required: true },
    {
      kind: "choice",
      name: "ServiceType",
      choices: SERVICE_TYPES,
      required: true,
    },
    {
      kind: "choice",
      name: "Status",
      choices: APPOINTMENT_STATUSES,
      required: true,
    },
    { kind: "scalar", name: "IsUrgent", type: "boolean" },
    { kind: "scalar", name: "Notes", type: "note" },
    {
      kind: "reference",
      name: "Patient",
      target: "Patients",
      displayField: "FullName",
      required: true,
    },
    {
      kind: "reference",
      name: "Doctor",
      target: "Doctors",
      displayField: "FullName",
      required: true,
    },
  ],
};

export const ACTIVITIES: CollectionSpec = {
  kind: "activity",
  name: "Activities",
  businessIdField: "ActivityID",
  titleField: "Title",
  fields: [
    {
      kind: "scalar",
      name: "ActivityID",
      type: "text",
      required: true,
      unique: true,
      indexed: true,
    },
    {
      kind: "scalar",
      name: "ActivityDateTime",
      type: "datetime",
      required: true,
    },
    {
      kind: "choice",
      name: "ActivityType",
      choices: ACTIVITY_TYPES,
      required: true,
    },
    { kind: "scalar", name: "Notes", type: "note" },
    { kind: "choice", name: "DurationMinutes", choices: ACTIVITY_DURATIONS },
    { kind: "choice", name: "Priority", choices: PRIORITIES, required: true },
    {
      kind: "computed",
      name: "Title",
      formula: [
        { field: "ActivityType" },
        { literal: " - " },
        { field: "Priority" },
      ],
    },
    {
      kind: "reference",
      name: "Patient",
      target: "Patients",
      displayField: "FullName",
      required: true,
    },
    {
      kind: "reference",
      name: "Doctor",
      target: "Doctors",
      displayField: "FullName",
    },
    {
      kind: "reference",
      name: "Appointment",
      target: "Appointments",
      displayField: "AppointmentID",
      required: true,
    },
  ],
};

/** All collections, in declaration order (sorting happens in the provisioner). */
export const COLLECTIONS: readonly CollectionSpec[] = [
  PATIENTS,
  DOCTORS,
  APPOINTMENTS,
  ACTIVITIES,
];

