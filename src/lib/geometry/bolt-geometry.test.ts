import { describe, it, expect } from "vitest";
import {
  createBoltGeometry,
  createThreadGeometry,
  describeBoltGeometry,
  helixAngle,
} from "./bolt-geometry.js";
import { M12, M6 } from "../../test/fixtures.js";

const EPS = 1e-9;

describe("createBoltGeometry", () => {
  it("computes the derived thread dimensions", () => {
    const g = createBoltGeometry(M12);
    expect(Math.abs(g.d2 - (12 - ((3 * Math.sqrt(3)) / 8) * 1.75))).toBeLessThan(EPS);
    expect(Math.abs(g.H - (Math.sqrt(3) / 2) * 1.75)).toBeLessThan(EPS);
    expect(Math.abs(g.C - Math.PI * 12)).toBeLessThan(EPS);
    expect(Math.abs(g.beta - (Math.atan2(1.75, Math.PI * 12) * 180) / Math.PI)).toBeLessThan(EPS);
  });

  it("computes minimum thread lengths from the nominal diameter", () => {
    const g = createBoltGeometry(M12);
    expect(g.b2).toBe(30);
    expect(g.b3).toBe(36);
    expect(g.b4).toBe(49);
  });

  it("keeps the base fields", () => {
    const g = createBoltGeometry(M6);
    expect(g.D).toBe(6);
    expect(g.k).toBe(4);
    expect(g.dgl).toBe(50);
    expect(g.cls).toEqual(M6.cls);
  });

  it("freezes the geometry and its length list", () => {
    const g = createBoltGeometry(M6);
    expect(Object.isFrozen(g)).toBe(true);
    expect(Object.isFrozen(g.cls)).toBe(true);
    expect(g.cls).not.toBe(M6.cls);
  });

  it("yields identical values when built twice", () => {
    expect(createBoltGeometry(M12)).toEqual(createBoltGeometry(M12));
  });
});

describe("helixAngle", () => {
  it("is strictly between 0 and 90 degrees for positive pitch", () => {
    const beta = helixAngle(1, Math.PI * 6);
    expect(beta).toBeGreaterThan(0);
    expect(beta).toBeLessThan(90);
  });

  it("is 45 degrees when pitch equals circumference", () => {
    expect(Math.abs(helixAngle(10, 10) - 45)).toBeLessThan(EPS);
  });
});

describe("createThreadGeometry", () => {
  it("uses the nominal circumference", () => {
    const t = createThreadGeometry(12, 1.75);
    expect(t.D).toBe(12);
    expect(t.P).toBe(1.75);
    expect(Math.abs(t.u - Math.PI * 12)).toBeLessThan(EPS);
    expect(t.beta).toBe(createBoltGeometry(M12).beta);
  });
});

describe("describeBoltGeometry", () => {
  it("formats diameter, pitch, circumference and helix angle", () => {
    const g = createBoltGeometry(M12);
    expect(describeBoltGeometry(g)).toBe(
      `[M12 P=1.75, C=${(Math.PI * 12).toFixed(4)}, beta=${g.beta.toFixed(4)}]`
    );
  });
});
