// src/store/memory_store.ts
import type { FieldSpec } from "../types/schema.js";
import type {
  FieldValue,
  FieldValues,
  StorageId,
  Store,
  StoredRecord,
} from "../types/store.js";
import { evaluateFormula, formulaDependencies } from "../schema/formula.js";
import { ValidationError } from "../core/errors.js";

type MemoryCollection = {
  fields: FieldSpec[];
  rows: Map<StorageId, FieldValues>;
  nextId: number;
};

export type StoreSnapshot = Record<string, StoredRecord[]>;

/**
 * In-process store with the same field rules as the database-backed one.
 * Dry runs seed into it; tests use it as the store stand-in.
 */
export class MemoryStore implements Store {
  private readonly collections = new Map<string, MemoryCollection>();

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string): Promise<void> {
    if (this.collections.has(name)) {
      throw new Error(`Collection ${name} already exists`);
    }
    this.collections.set(name, { fields: [], rows: new Map(), nextId: 1 });
  }

  async deleteCollection(name: string): Promise<void> {
    this.get(name);
    this.collections.delete(name);
  }

  async addField(collection: string, field: FieldSpec): Promise<void> {
    const target = this.get(collection);
    if (target.fields.some((f) => f.name === field.name)) {
      throw new Error(`Field ${collection}.${field.name} already exists`);
    }

    if (field.kind === "computed") {
      for (const dep of formulaDependencies(field)) {
        if (!target.fields.some((f) => f.name === dep)) {
          throw new Error(
            `Computed field ${collection}.${field.name} reads ${dep}, which does not exist yet`,
          );
        }
      }
    }

    if (field.kind === "reference") {
      const referenced = this.collections.get(field.target);
      if (!referenced) {
        throw new Error(
          `Reference ${collection}.${field.name} targets missing collection ${field.target}`,
        );
      }
      if (!referenced.fields.some((f) => f.name === field.displayField)) {
        throw new Error(
          `Reference ${collection}.${field.name} shows ${field.target}.${field.displayField}, which does not exist`,
        );
      }
    }

    target.fields.push(field);
  }

  async createRecord(
    collection: string,
    values: FieldValues,
  ): Promise<StorageId> {
    const target = this.get(collection);
    const row: FieldValues = {};

    for (const name of Object.keys(values)) {
      const field = target.fields.find((f) => f.name === name);
      if (!field) {
        throw new ValidationError(collection, `unknown field ${name}`);
      }
      if (field.kind === "computed") {
        throw new ValidationError(
          collection,
          `computed field ${name} cannot be set directly`,
        );
      }
    }

    for (const field of target.fields) {
      if (field.kind === "computed") continue;
      const value = values[field.name] ?? null;

      if (value === null) {
        if (field.required) {
          throw new ValidationError(
            collection,
            `required field ${field.name} is missing`,
          );
        }
        row[field.name] = null;
        continue;
      }

      if (field.kind === "choice" && !field.choices.includes(String(value))) {
        throw new ValidationError(
          collection,
          `${String(value)} is not a valid choice for ${field.name}`,
        );
      }

      if (field.kind === "reference") {
        const referenced = this.collections.get(field.target);
        if (typeof value !== "number" || !referenced?.rows.has(value)) {
          throw new ValidationError(
            collection,
            `${field.name} references ${String(value)}, which is not a ${field.target} record`,
          );
        }
      }

      if (field.kind === "scalar" && field.unique) {
        for (const existing of target.rows.values()) {
          if (sameValue(existing[field.name], value)) {
            throw new ValidationError(
              collection,
              `duplicate value ${String(value)} for unique field ${field.name}`,
            );
          }
        }
      }

      row[field.name] = value;
    }

    for (const field of target.fields) {
      if (field.kind === "computed") {
        row[field.name] = evaluateFormula(field.formula, row);
      }
    }

    const storageId = target.nextId++;
    target.rows.set(storageId, row);
    return storageId;
  }

  async listRecords(collection: string): Promise<StoredRecord[]> {
    const target = this.get(collection);
    return [...target.rows.entries()]
      .sort(([a], [b]) => a - b)
      .map(([storageId, values]) => ({ storageId, values: { ...values } }));
  }

  async deleteRecord(collection: string, storageId: StorageId): Promise<void> {
    const target = this.get(collection);
    if (!target.rows.delete(storageId)) {
      throw new Error(`No record ${storageId} in ${collection}`);
    }
  }

  async close(): Promise<void> {}

  /** Field names of a collection, in the order they were added. */
  fieldNames(collection: string): string[] {
    return this.get(collection).fields.map((f) => f.name);
  }

  async snapshot(): Promise<StoreSnapshot> {
    const result: StoreSnapshot = {};
    for (const name of this.collections.keys()) {
      result[name] = await this.listRecords(name);
    }
    return result;
  }

  private get(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(`Collection ${name} does not exist`);
    }
    return collection;
  }
}

function sameValue(a: FieldValue | undefined, b: FieldValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}
