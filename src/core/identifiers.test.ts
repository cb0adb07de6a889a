import { describe, it, expect } from "vitest";
import { formatBusinessId } from "./identifiers.js";

describe("formatBusinessId", () => {
  it("pads each kind to its width", () => {
    expect(formatBusinessId("patient", 7)).toBe("MRN00007");
    expect(formatBusinessId("doctor", 12)).toBe("DOC0012");
    expect(formatBusinessId("appointment", 1)).toBe("APP000001");
    expect(formatBusinessId("activity", 345)).toBe("ACT000345");
  });

  it("widens instead of truncating past the padding", () => {
    expect(formatBusinessId("patient", 99999)).toBe("MRN99999");
    expect(formatBusinessId("patient", 123456)).toBe("MRN123456");
    expect(formatBusinessId("doctor", 10000)).toBe("DOC10000");
  });

  it("is injective and well-formed for patients 1..30000", () => {
    const seen = new Set<string>();
    for (let n = 1; n <= 30000; n++) {
      const id = formatBusinessId("patient", n);
      expect(id).toMatch(/^MRN\d{5}$/);
      seen.add(id);
    }
    expect(seen.size).toBe(30000);
  });

  it("rejects sequence numbers that are not positive integers", () => {
    expect(() => formatBusinessId("patient", 0)).toThrow(RangeError);
    expect(() => formatBusinessId("doctor", -3)).toThrow(RangeError);
    expect(() => formatBusinessId("activity", 1.5)).toThrow(RangeError);
  });
});
