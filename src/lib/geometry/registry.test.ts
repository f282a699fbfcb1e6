import { describe, it, expect } from "vitest";
import { GeometryTable, defaultGeometryTable, parseGeometryData, readGeometryData } from "./registry.js";
import { GeometryNotFoundError } from "../errors.js";
import { M12, M6, M8, testTable } from "../../test/fixtures.js";

const ISO_DIAMETERS = [3, 4, 5, 6, 8, 10, 12, 14, 16, 18, 20, 22, 24, 27, 30, 33, 36, 39, 42, 45, 48, 52, 56, 64];

describe("GeometryTable", () => {
  it("keeps registration order", () => {
    const table = GeometryTable.of([M12, M6, M8]);
    expect(table.diameters()).toEqual([12, 6, 8]);
    expect(table.getBoltGeometries().map((g) => g.D)).toEqual([12, 6, 8]);
  });

  it("returns a not-found result for unknown diameters", () => {
    const lookup = testTable().get(7);
    expect(lookup.ok).toBe(false);
    if (!lookup.ok) {
      expect(lookup.error).toBeInstanceOf(GeometryNotFoundError);
      expect(lookup.error.message).toBe("No bolt geometry registered for M7");
    }
  });

  it("returns the entry for a registered diameter", () => {
    const lookup = testTable().get(8);
    expect(lookup.ok && lookup.geometry.P).toBe(1.25);
    expect(testTable().has(8)).toBe(true);
    expect(testTable().has(7)).toBe(false);
  });

  it("require throws for unknown diameters", () => {
    expect(() => testTable().require(100)).toThrow(GeometryNotFoundError);
    expect(testTable().require(6).D).toBe(6);
  });

  it("throws on a duplicate diameter", () => {
    const table = GeometryTable.of([M6, M8, M6]);
    expect(() => table.getBoltGeometries()).toThrow("Duplicate nominal diameter M6 in geometry table");
  });

  it("builds entries once", () => {
    let calls = 0;
    const table = new GeometryTable(() => {
      calls++;
      return [M6];
    });
    const first = table.getBoltGeometries();
    const second = table.getBoltGeometries();
    expect(calls).toBe(1);
    expect(second[0]).toBe(first[0]);
  });

  it("derives thread geometries from the same rows", () => {
    const threads = testTable().getThreadGeometries();
    expect(threads.map((t) => [t.D, t.P])).toEqual([
      [6, 1],
      [8, 1.25],
      [12, 1.75],
    ]);
  });
});

describe("parseGeometryData", () => {
  it("rejects non-ascending customary lengths", () => {
    expect(() => parseGeometryData({ rows: [{ ...M6, cls: [10, 8] }] })).toThrow(
      'Invalid geometry data at "rows.0.cls": customary lengths must be strictly ascending'
    );
  });

  it("rejects empty customary lengths", () => {
    expect(() => parseGeometryData({ rows: [{ ...M6, cls: [] }] })).toThrow(/rows\.0\.cls/);
  });

  it("rejects a non-integer nominal diameter", () => {
    expect(() => parseGeometryData({ rows: [{ ...M6, D: 6.5 }] })).toThrow(/rows\.0\.D/);
  });

  it("accepts rows without clearance hole diameters", () => {
    const { dh1: _dh1, dh2: _dh2, dh3: _dh3, ...rest } = M6;
    expect(parseGeometryData({ rows: [rest] })[0].dh1).toBeUndefined();
  });
});

describe("bundled table", () => {
  it("covers the ISO metric coarse-thread series", () => {
    expect(readGeometryData().map((r) => r.D)).toEqual(ISO_DIAMETERS);
  });

  it("has helix angles strictly between 0 and 90 degrees", () => {
    for (const g of defaultGeometryTable().getBoltGeometries()) {
      expect(g.beta).toBeGreaterThan(0);
      expect(g.beta).toBeLessThan(90);
    }
  });

  it("has M12 with default grip length 100", () => {
    const g = defaultGeometryTable().require(12);
    expect(g.P).toBe(1.75);
    expect(g.dgl).toBe(100);
  });
});
