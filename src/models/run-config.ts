// src/models/run-config.ts
import { z } from "zod";
import { parseCalendarDate } from "../core/temporal.js";

// A real calendar day: "2024-02-31" would otherwise roll over into March
const CalendarDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: "expected a YYYY-MM-DD date" })
  .refine((v) => calendarDay(v) !== null, {
    message: "not a day of the calendar",
  });

// Null for anything that is not a real YYYY-MM-DD day
function calendarDay(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;
  const [, year, month, day] = match.map(Number);
  const date = parseCalendarDate(value);
  return date.getFullYear() === year &&
    date.getMonth() + 1 === month &&
    date.getDate() === day
    ? date
    : null;
}

/**
 * How many records of each kind a run synthesizes.
 */
export const CountsSchema = z.object({
  patients: z.number().int().nonnegative().default(30),
  doctors: z.number().int().nonnegative().default(10),
  appointments: z.number().int().nonnegative().default(30),
  activities: z.number().int().nonnegative().default(50),
});

/**
 * Patient date of birth falls between maxAgeYears and minAgeYears before now.
 */
export const PatientsSchema = z
  .object({
    minAgeYears: z.number().int().nonnegative().default(18),
    maxAgeYears: z.number().int().positive().default(50),
  })
  .refine((v) => v.maxAgeYears > v.minAgeYears, {
    message: "maxAgeYears must be > minAgeYears",
    path: ["maxAgeYears"],
  });

/**
 * Appointment start times are drawn from [now - daysBefore, now + daysAfter).
 */
export const AppointmentsSchema = z
  .object({
    daysBefore: z.number().int().nonnegative().default(0),
    daysAfter: z.number().int().nonnegative().default(30),
    durationMinutes: z.number().int().positive().default(45),
    // Urgent when a 1-10 draw is at most this
    urgentOutOfTen: z.number().int().min(0).max(10).default(2),
  })
  .refine((v) => v.daysBefore + v.daysAfter > 0, {
    message: "the appointment window must span at least one day",
    path: ["daysAfter"],
  });

/**
 * Fixed historical calendar window for activity timestamps (end exclusive).
 */
export const ActivitiesSchema = z
  .object({
    from: CalendarDate.default("2024-01-01"),
    to: CalendarDate.default("2024-12-31"),
  })
  .refine(
    (v) => {
      const from = calendarDay(v.from);
      const to = calendarDay(v.to);
      return from === null || to === null || to.getTime() > from.getTime();
    },
    { message: "to must be after from", path: ["to"] },
  );

export const RunConfigSchema = z.object({
  seed: z.number().int().optional(),
  counts: CountsSchema.default({}),
  patients: PatientsSchema.default({}),
  appointments: AppointmentsSchema.default({}),
  activities: ActivitiesSchema.default({}),
});
