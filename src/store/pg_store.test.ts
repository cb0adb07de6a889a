/**
 * PostgresStore: Test Suite
 *
 * Runs the store against a recording client and checks the SQL it sends:
 *   - column types, NOT NULL and UNIQUE for scalar fields
 *   - CHECK lists for choice fields
 *   - generated columns for computed fields
 *   - foreign keys and the display comment for reference fields
 *   - record rejections surfaced as ValidationError
 */

import { describe, it, expect, beforeEach } from "vitest";
import pg from "pg";
import { PostgresStore, type SqlClient } from "./pg_store.js";
import { ValidationError } from "../core/errors.js";

type Row = Record<string, unknown>;

/** Answers each query from a queue of result rows and keeps what it was sent. */
class RecordingClient implements SqlClient {
  readonly sent: Array<{ text: string; values?: unknown[] }> = [];
  readonly replies: Array<Row[] | Error> = [];

  async query(text: string, values?: unknown[]): Promise<{ rows: Row[] }> {
    this.sent.push({ text, values });
    const reply = this.replies.shift() ?? [];
    if (reply instanceof Error) throw reply;
    return { rows: reply };
  }

  escapeIdentifier(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }

  escapeLiteral(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
  }

  async end(): Promise<void> {}

  get statements(): string[] {
    return this.sent.map((q) => q.text.trim());
  }
}

let client: RecordingClient;
let store: PostgresStore;

beforeEach(() => {
  client = new RecordingClient();
  store = new PostgresStore(client);
});

describe("addField", () => {
  it("adds a required unique scalar column", async () => {
    await store.addField("Patients", {
      kind: "scalar",
      name: "PatientID",
      type: "text",
      required: true,
      unique: true,
      indexed: true,
    });

    expect(client.statements).toEqual([
      'ALTER TABLE "Patients" ADD COLUMN "PatientID" text NOT NULL UNIQUE;',
    ]);
  });

  it("indexes a non-unique indexed column", async () => {
    await store.addField("Appointments", {
      kind: "scalar",
      name: "StartTime",
      type: "datetime",
      required: true,
      indexed: true,
    });

    expect(client.statements).toEqual([
      'ALTER TABLE "Appointments" ADD COLUMN "StartTime" timestamptz NOT NULL;',
      'CREATE INDEX "Appointments_StartTime_idx" ON "Appointments" ("StartTime");',
    ]);
  });

  it("limits a choice column with a CHECK list", async () => {
    await store.addField("Patients", {
      kind: "choice",
      name: "Gender",
      choices: ["Male", "Female", "O'Neil"],
      required: true,
    });

    expect(client.statements).toEqual([
      `ALTER TABLE "Patients" ADD COLUMN "Gender" text NOT NULL CHECK ("Gender" IN ('Male', 'Female', 'O''Neil'));`,
    ]);
  });

  it("stores a computed field as a generated column", async () => {
    await store.addField("Patients", {
      kind: "computed",
      name: "FullName",
      formula: [{ field: "FirstName" }, { literal: " " }, { field: "LastName" }],
    });

    expect(client.statements).toEqual([
      `ALTER TABLE "Patients" ADD COLUMN "FullName" text GENERATED ALWAYS AS ("FirstName"::text || ' ' || "LastName"::text) STORED;`,
    ]);
  });

  it("adds a foreign key and records the display field", async () => {
    client.replies.push([{ column_name: "FullName" }]);

    await store.addField("Appointments", {
      kind: "reference",
      name: "Patient",
      target: "Patients",
      displayField: "FullName",
      required: true,
    });

    expect(client.sent[0]?.values).toEqual(["Patients", "FullName"]);
    expect(client.statements.slice(1)).toEqual([
      'ALTER TABLE "Appointments" ADD COLUMN "Patient" integer NOT NULL REFERENCES "Patients" (id);',
      `COMMENT ON COLUMN "Appointments"."Patient" IS 'display:FullName';`,
    ]);
  });

  it("refuses a reference whose display field does not exist", async () => {
    client.replies.push([]);

    await expect(
      store.addField("Activities", {
        kind: "reference",
        name: "Doctor",
        target: "Doctors",
        displayField: "Nickname",
      }),
    ).rejects.toThrow(
      "Reference Activities.Doctor shows Doctors.Nickname, which does not exist",
    );
    expect(client.sent).toHaveLength(1);
  });
});

describe("records", () => {
  it("inserts the given values and returns the new id", async () => {
    client.replies.push([{ id: 7 }]);

    const id = await store.createRecord("Doctors", {
      DoctorID: "DOC0001",
      FirstName: "Ada",
    });

    expect(id).toBe(7);
    expect(client.sent[0]).toEqual({
      text: 'INSERT INTO "Doctors" ("DoctorID", "FirstName") VALUES ($1, $2) RETURNING id;',
      values: ["DOC0001", "Ada"],
    });
  });

  it("reports a constraint violation as a ValidationError", async () => {
    const violation = new pg.DatabaseError(
      'duplicate key value violates unique constraint "Doctors_DoctorID_key"',
      0,
      "error",
    );
    violation.code = "23505";
    client.replies.push(violation);

    const attempt = store.createRecord("Doctors", { DoctorID: "DOC0001" });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow(
      'Doctors: duplicate key value violates unique constraint "Doctors_DoctorID_key"',
    );
  });

  it("passes other errors through", async () => {
    client.replies.push(new Error("connection terminated"));

    await expect(
      store.createRecord("Doctors", { DoctorID: "DOC0001" }),
    ).rejects.toThrow(new Error("connection terminated"));
  });

  it("lists rows with id as the storage identifier", async () => {
    client.replies.push([
      { id: 1, DoctorID: "DOC0001", FirstName: "Ada", Notes: undefined },
      { id: 2, DoctorID: "DOC0002", FirstName: "Grace", Notes: null },
    ]);

    expect(await store.listRecords("Doctors")).toEqual([
      { storageId: 1, values: { DoctorID: "DOC0001", FirstName: "Ada", Notes: null } },
      { storageId: 2, values: { DoctorID: "DOC0002", FirstName: "Grace", Notes: null } },
    ]);
    expect(client.statements).toEqual(['SELECT * FROM "Doctors" ORDER BY id;']);
  });
});
