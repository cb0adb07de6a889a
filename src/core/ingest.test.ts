import { describe, it, expect, beforeEach, vi, type MockInstance } from "vitest";
import { clearExistingData, ingestRecords } from "./ingest.js";
import { provisionCollections } from "./provision.js";
import { ResolvedIds, readPersisted } from "./resolve.js";
import { MemoryStore } from "../store/memory_store.js";
import { FailingStore, RecordingStore } from "../store/test_stores.js";
import { APPOINTMENTS, COLLECTIONS, DOCTORS, PATIENTS } from "../schema/collections.js";
import type { RecordDraft } from "../types/records.js";

function patientDraft(n: number): RecordDraft {
  const id = `MRN${String(n).padStart(5, "0")}`;
  return {
    kind: "patient",
    businessId: id,
    title: `Pat ${n}`,
    values: {
      PatientID: id,
      FirstName: "Pat",
      LastName: String(n),
      DateOfBirth: new Date(1990, 0, n),
      Gender: "Other",
      Status: "New",
    },
    links: [],
  };
}

function doctorDraft(n: number): RecordDraft {
  const id = `DOC${String(n).padStart(4, "0")}`;
  return {
    kind: "doctor",
    businessId: id,
    title: `Dr. Doc ${n}`,
    values: { DoctorID: id, FirstName: "Doc", LastName: String(n), Specialization: "Oncology" },
    links: [],
  };
}

function appointmentDraft(n: number, patientId: string, doctorId: string): RecordDraft {
  const id = `APP${String(n).padStart(6, "0")}`;
  return {
    kind: "appointment",
    businessId: id,
    title: id,
    values: {
      AppointmentID: id,
      StartTime: new Date(2026, 0, n, 9),
      EndTime: new Date(2026, 0, n, 9, 45),
      ServiceType: "Telehealth",
      Status: "Scheduled",
    },
    links: [
      { field: "Patient", target: "patient", businessId: patientId },
      { field: "Doctor", target: "doctor", businessId: doctorId },
    ],
  };
}

let errorSpy: MockInstance<typeof console.error>;

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("ingestRecords", () => {
  it("creates every record and reports the count", async () => {
    const store = new MemoryStore();
    await provisionCollections(store, COLLECTIONS);
    const drafts = [1, 2, 3].map(patientDraft);

    const report = await ingestRecords(store, PATIENTS, drafts, ResolvedIds.empty());

    expect(report).toEqual({ collection: "Patients", attempted: 3, created: 3, failures: [] });
    const names = (await store.listRecords("Patients")).map((r) => r.values.FullName);
    expect(names).toEqual(["Pat 1", "Pat 2", "Pat 3"]);
  });

  it("keeps going after a store failure on the 5th of 30 creates", async () => {
    const store = new FailingStore("Patients", 5);
    await provisionCollections(store, COLLECTIONS);
    const drafts = Array.from({ length: 30 }, (_, i) => patientDraft(i + 1));

    const report = await ingestRecords(store, PATIENTS, drafts, ResolvedIds.empty());

    expect(report.created).toBe(29);
    expect(report.failures).toEqual([
      { businessId: "MRN00005", title: "Pat 5", reason: "connection reset" },
    ]);
    expect(errorSpy).toHaveBeenCalledWith(
      '⚠️  Failed to create Patients record MRN00005 "Pat 5": connection reset',
    );
    expect(await store.listRecords("Patients")).toHaveLength(29);
  });

  it("resolves references to storage ids and skips records that cannot resolve", async () => {
    const store = new MemoryStore();
    await provisionCollections(store, COLLECTIONS);
    await ingestRecords(store, PATIENTS, [1, 2].map(patientDraft), ResolvedIds.empty());
    await ingestRecords(store, DOCTORS, [doctorDraft(1)], ResolvedIds.empty());
    const resolved = ResolvedIds.empty()
      .with(await readPersisted(store, PATIENTS))
      .with(await readPersisted(store, DOCTORS));

    const report = await ingestRecords(
      store,
      APPOINTMENTS,
      [
        appointmentDraft(1, "MRN00002", "DOC0001"),
        appointmentDraft(2, "MRN99999", "DOC0001"),
        appointmentDraft(3, "MRN00001", "DOC0001"),
      ],
      resolved,
    );

    expect(report.created).toBe(2);
    expect(report.failures).toEqual([
      {
        businessId: "APP000002",
        title: "APP000002",
        reason: "No persisted patient with business identifier MRN99999",
      },
    ]);
    const links = (await store.listRecords("Appointments")).map((r) => [
      r.values.AppointmentID,
      r.values.Patient,
      r.values.Doctor,
    ]);
    expect(links).toEqual([
      ["APP000001", 2, 1],
      ["APP000003", 1, 1],
    ]);
  });

  it("counts store validation failures without stopping", async () => {
    const store = new MemoryStore();
    await provisionCollections(store, COLLECTIONS);
    const duplicate = patientDraft(1);

    const report = await ingestRecords(
      store,
      PATIENTS,
      [patientDraft(1), duplicate, patientDraft(2)],
      ResolvedIds.empty(),
    );

    expect(report.created).toBe(2);
    expect(report.failures.map((f) => f.reason)).toEqual([
      "Patients: duplicate value MRN00001 for unique field PatientID",
    ]);
  });
});

describe("readPersisted", () => {
  it("maps each persisted business id to its storage id", async () => {
    const store = new MemoryStore();
    await provisionCollections(store, COLLECTIONS);
    await ingestRecords(store, PATIENTS, [1, 2, 3].map(patientDraft), ResolvedIds.empty());

    const set = await readPersisted(store, PATIENTS);

    expect(set.lookup.size).toBe(3);
    expect([...set.lookup.entries()]).toEqual([
      ["MRN00001", 1],
      ["MRN00002", 2],
      ["MRN00003", 3],
    ]);
    expect(set.entries.map((e) => e.display)).toEqual(["Pat 1", "Pat 2", "Pat 3"]);
  });
});

describe("clearExistingData", () => {
  it("deletes activities, appointments, doctors, then patients", async () => {
    const store = new RecordingStore();
    await provisionCollections(store, COLLECTIONS);
    await ingestRecords(store, PATIENTS, [1, 2].map(patientDraft), ResolvedIds.empty());
    await ingestRecords(store, DOCTORS, [doctorDraft(1)], ResolvedIds.empty());
    const resolved = ResolvedIds.empty()
      .with(await readPersisted(store, PATIENTS))
      .with(await readPersisted(store, DOCTORS));
    await ingestRecords(store, APPOINTMENTS, [appointmentDraft(1, "MRN00001", "DOC0001")], resolved);

    const deleted = await clearExistingData(store, COLLECTIONS);

    expect(deleted).toEqual({ Activities: 0, Appointments: 1, Doctors: 1, Patients: 2 });
    expect(store.deletions).toEqual(["Appointments", "Doctors", "Patients", "Patients"]);
  });

  it("skips collections that do not exist yet", async () => {
    const store = new MemoryStore();
    expect(await clearExistingData(store, COLLECTIONS)).toEqual({});
  });
});
