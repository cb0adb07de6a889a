// src/schema/formula.ts
import type { ComputedFieldSpec, FormulaPart } from "../types/schema.js";
import type { FieldValue, FieldValues } from "../types/store.js";

/**
 * Evaluate a computed field's concatenation formula against a record.
 * Missing or null fields contribute an empty string.
 */
export function evaluateFormula(
  formula: readonly FormulaPart[],
  values: FieldValues,
): string {
  return formula
    .map((part) =>
      "literal" in part ? part.literal : stringifyValue(values[part.field]),
    )
    .join("");
}

/** Names of the fields a computed field reads. */
export function formulaDependencies(field: ComputedFieldSpec): string[] {
  const deps: string[] = [];
  for (const part of field.formula) {
    if ("field" in part) deps.push(part.field);
  }
  return deps;
}

function stringifyValue(value: FieldValue | undefined): string {
  if (value == null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
