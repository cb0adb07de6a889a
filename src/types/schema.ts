// src/types/schema.ts

export type EntityKind = "patient" | "doctor" | "appointment" | "activity";

export type ScalarType =
  | "text"
  | "note"
  | "number"
  | "boolean"
  | "date"
  | "datetime"
  | "email"
  | "phone";

type FieldBase = {
  name: string;
  required?: boolean;
};

export type ScalarFieldSpec = FieldBase & {
  kind: "scalar";
  type: ScalarType;
  unique?: boolean;
  indexed?: boolean;
};

export type ChoiceFieldSpec = FieldBase & {
  kind: "choice";
  choices: readonly string[];
};

/** One piece of a computed field's concatenation formula. */
export type FormulaPart = { field: string } | { literal: string };

export type ComputedFieldSpec = {
  kind: "computed";
  name: string;
  formula: readonly FormulaPart[];
};

export type ReferenceFieldSpec = FieldBase & {
  kind: "reference";
  target: string; // collection name
  displayField: string; // field on the target shown for the link
};

export type FieldSpec =
  | ScalarFieldSpec
  | ChoiceFieldSpec
  | ComputedFieldSpec
  | ReferenceFieldSpec;

export type CollectionSpec = {
  kind: EntityKind;
  name: string;
  businessIdField: string;
  // Field used as the record's display title in logs
  titleField: string;
  fields: readonly FieldSpec[];
};
