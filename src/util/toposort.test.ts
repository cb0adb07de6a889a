import { describe, it, expect } from "vitest";
import { buildReferenceEdges, dependencyOrder, toposort } from "./toposort.js";
import {
  ACTIVITIES,
  APPOINTMENTS,
  COLLECTIONS,
  DOCTORS,
  PATIENTS,
} from "../schema/collections.js";

describe("dependencyOrder", () => {
  it("orders the clinic collections patients, doctors, appointments, activities", () => {
    expect(dependencyOrder(COLLECTIONS).map((c) => c.name)).toEqual([
      "Patients",
      "Doctors",
      "Appointments",
      "Activities",
    ]);
  });

  it("puts reference targets first whatever the declaration order", () => {
    const order = dependencyOrder([ACTIVITIES, APPOINTMENTS, DOCTORS, PATIENTS]);
    expect(order.map((c) => c.name)).toEqual([
      "Doctors",
      "Patients",
      "Appointments",
      "Activities",
    ]);
  });
});

describe("buildReferenceEdges", () => {
  it("lists one edge per referenced collection", () => {
    expect(buildReferenceEdges([APPOINTMENTS])).toEqual([
      { from: "Appointments", to: "Patients" },
      { from: "Appointments", to: "Doctors" },
    ]);
  });
});

describe("toposort", () => {
  it("reports cycles", () => {
    expect(() =>
      toposort(
        ["a", "b"],
        [
          { from: "a", to: "b" },
          { from: "b", to: "a" },
        ],
      ),
    ).toThrow("Circular reference detected involving collections: a, b");
  });
});
