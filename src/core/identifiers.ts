// src/core/identifiers.ts
import type { EntityKind } from "../types/schema.js";

const FORMATS: Record<EntityKind, { prefix: string; width: number }> = {
  patient: { prefix: "MRN", width: 5 },
  doctor: { prefix: "DOC", width: 4 },
  appointment: { prefix: "APP", width: 6 },
  activity: { prefix: "ACT", width: 6 },
};

/**
 * Format a 1-based sequence number as the kind's business identifier,
 * e.g. ("patient", 7) -> "MRN00007". Numbers wider than the padding widen
 * the identifier instead of truncating it.
 */
export function formatBusinessId(kind: EntityKind, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new RangeError(
      `Sequence number must be a positive integer, got ${sequence}`,
    );
  }
  const { prefix, width } = FORMATS[kind];
  return `${prefix}${String(sequence).padStart(width, "0")}`;
}
