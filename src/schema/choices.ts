// src/schema/choices.ts

export const GENDERS = ["Male", "Female", "Other"] as const;

export const PATIENT_STATUSES = [
  "New",
  "In Treatment",
  "Awaiting Follow-up",
  "High Priority",
  "Discharged",
] as const;

export const SPECIALIZATIONS = [
  "Cardiology",
  "Dermatology",
  "Endocrinology",
  "Family Medicine",
  "Neurology",
  "Oncology",
  "Orthopedics",
  "Pediatrics",
  "Psychiatry",
  "Pulmonology",
] as const;

export const DEPARTMENTS = [
  "Outpatient",
  "Inpatient",
  "Emergency",
  "Surgery",
  "Diagnostics",
  "Rehabilitation",
] as const;

export const SERVICE_TYPES = [
  "General Consultation",
  "Follow-up Visit",
  "Annual Physical",
  "Vaccination",
  "Lab Work",
  "Imaging",
  "Specialist Referral",
  "Telehealth",
  "Minor Procedure",
  "Physical Therapy",
] as const;

export const PAST_APPOINTMENT_STATUSES = [
  "Completed",
  "No Show",
  "Cancelled",
] as const;

export const FUTURE_APPOINTMENT_STATUSES = [
  "Scheduled",
  "Confirmed",
  "Rescheduled",
] as const;

export const APPOINTMENT_STATUSES = [
  ...FUTURE_APPOINTMENT_STATUSES,
  ...PAST_APPOINTMENT_STATUSES,
] as const;

export const ACTIVITY_TYPES = [
  "Consultation Note",
  "Lab Order",
  "Prescription",
  "Follow-up Call",
  "Referral",
  "Imaging Order",
  "Care Plan Update",
  "Patient Education",
] as const;

export const ACTIVITY_DURATIONS = ["15", "30", "45", "60"] as const;

export const PRIORITIES = ["Normal", "High", "Low", "Urgent"] as const;
