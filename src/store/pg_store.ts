// src/store/pg_store.ts
import pg from "pg";
import type { FieldSpec, ScalarType } from "../types/schema.js";
import type {
  FieldValue,
  FieldValues,
  StorageId,
  Store,
  StoredRecord,
} from "../types/store.js";
import { ValidationError } from "../core/errors.js";

const { Client, DatabaseError } = pg;

const COLUMN_TYPES: Record<ScalarType, string> = {
  text: "text",
  note: "text",
  number: "double precision",
  boolean: "boolean",
  date: "date",
  datetime: "timestamptz",
  email: "text",
  phone: "text",
};

/**
 * SQLSTATEs an insert raises when a record breaks the collection's rules:
 * integrity violations (class 23), unknown columns, unparsable values.
 */
function isRecordRejection(error: unknown): boolean {
  if (!(error instanceof DatabaseError) || !error.code) return false;
  return (
    error.code.startsWith("23") ||
    error.code === "42703" ||
    error.code === "22P02" ||
    error.code === "22007"
  );
}

/** The part of a connected `pg` client the store talks to. */
export type SqlClient = {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
  escapeIdentifier(value: string): string;
  escapeLiteral(value: string): string;
  end(): Promise<void>;
};

/**
 * A structured-list store on PostgreSQL. Each collection is a table in the
 * public schema whose `id` serial column is the storage identifier.
 */
export class PostgresStore implements Store {
  constructor(private readonly client: SqlClient) {}

  static async connect(connectionString: string): Promise<PostgresStore> {
    const client = new Client({ connectionString });
    await client.connect();
    return new PostgresStore({
      query: (text, values) => client.query(text, values),
      escapeIdentifier: (value) => client.escapeIdentifier(value),
      escapeLiteral: (value) => client.escapeLiteral(value),
      end: () => client.end(),
    });
  }

  async collectionExists(name: string): Promise<boolean> {
    const res = await this.client.query(
      `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_type = 'BASE TABLE'
        AND table_name = $1;
    `,
      [name],
    );
    return res.rows.length > 0;
  }

  async createCollection(name: string): Promise<void> {
    await this.client.query(
      `CREATE TABLE ${this.ident(name)} (id serial PRIMARY KEY);`,
    );
  }

  async deleteCollection(name: string): Promise<void> {
    // CASCADE drops the foreign keys other collections hold on this one
    await this.client.query(`DROP TABLE ${this.ident(name)} CASCADE;`);
  }

  async addField(collection: string, field: FieldSpec): Promise<void> {
    const table = this.ident(collection);
    const column = this.ident(field.name);

    switch (field.kind) {
      case "scalar": {
        const constraints = [
          field.required ? "NOT NULL" : "",
          field.unique ? "UNIQUE" : "",
        ].filter(Boolean);
        await this.client.query(
          `ALTER TABLE ${table} ADD COLUMN ${column} ${COLUMN_TYPES[field.type]} ${constraints.join(" ")};`,
        );
        // UNIQUE already brings an index
        if (field.indexed && !field.unique) {
          await this.client.query(
            `CREATE INDEX ${this.ident(`${collection}_${field.name}_idx`)} ON ${table} (${column});`,
          );
        }
        break;
      }
      case "choice": {
        const choices = field.choices
          .map((c) => this.client.escapeLiteral(c))
          .join(", ");
        await this.client.query(
          `ALTER TABLE ${table} ADD COLUMN ${column} text ${field.required ? "NOT NULL" : ""} CHECK (${column} IN (${choices}));`,
        );
        break;
      }
      case "computed": {
        const expression = field.formula
          .map((part) =>
            "literal" in part
              ? this.client.escapeLiteral(part.literal)
              : `${this.ident(part.field)}::text`,
          )
          .join(" || ");
        await this.client.query(
          `ALTER TABLE ${table} ADD COLUMN ${column} text GENERATED ALWAYS AS (${expression}) STORED;`,
        );
        break;
      }
      case "reference": {
        const displayRes = await this.client.query(
          `
          SELECT column_name
          FROM information_schema.columns
          WHERE table_schema = 'public'
            AND table_name = $1
            AND column_name = $2;
        `,
          [field.target, field.displayField],
        );
        if (displayRes.rows.length === 0) {
          throw new Error(
            `Reference ${collection}.${field.name} shows ${field.target}.${field.displayField}, which does not exist`,
          );
        }
        await this.client.query(
          `ALTER TABLE ${table} ADD COLUMN ${column} integer ${field.required ? "NOT NULL" : ""} REFERENCES ${this.ident(field.target)} (id);`,
        );
        await this.client.query(
          `COMMENT ON COLUMN ${table}.${column} IS ${this.client.escapeLiteral(`display:${field.displayField}`)};`,
        );
        break;
      }
    }
  }

  async createRecord(
    collection: string,
    values: FieldValues,
  ): Promise<StorageId> {
    const names = Object.keys(values);
    const columns = names.map((n) => this.ident(n)).join(", ");
    const params = names.map((_, i) => `$${i + 1}`).join(", ");

    try {
      const res = await this.client.query(
        names.length === 0
          ? `INSERT INTO ${this.ident(collection)} DEFAULT VALUES RETURNING id;`
          : `INSERT INTO ${this.ident(collection)} (${columns}) VALUES (${params}) RETURNING id;`,
        names.map((n) => values[n] ?? null),
      );
      const id = res.rows[0]?.id;
      if (typeof id !== "number") {
        throw new Error(`Insert into ${collection} returned no id`);
      }
      return id;
    } catch (error) {
      if (isRecordRejection(error)) {
        throw new ValidationError(
          collection,
          error instanceof Error ? error.message : String(error),
          { cause: error },
        );
      }
      throw error;
    }
  }

  async listRecords(collection: string): Promise<StoredRecord[]> {
    const res = await this.client.query(
      `SELECT * FROM ${this.ident(collection)} ORDER BY id;`,
    );
    return res.rows.map((row) => {
      const values: FieldValues = {};
      let storageId: StorageId | undefined;
      for (const [name, raw] of Object.entries(row)) {
        if (name === "id") {
          storageId = Number(raw);
        } else {
          values[name] = toFieldValue(raw);
        }
      }
      if (storageId === undefined) {
        throw new Error(`Row in ${collection} has no id column`);
      }
      return { storageId, values };
    });
  }

  async deleteRecord(collection: string, storageId: StorageId): Promise<void> {
    await this.client.query(
      `DELETE FROM ${this.ident(collection)} WHERE id = $1;`,
      [storageId],
    );
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private ident(name: string): string {
    return this.client.escapeIdentifier(name);
  }
}

function toFieldValue(raw: unknown): FieldValue {
  if (
    raw === null ||
    typeof raw === "string" ||
    typeof raw === "number" ||
    typeof raw === "boolean" ||
    raw instanceof Date
  ) {
    return raw;
  }
  return raw === undefined ? null : String(raw);
}
