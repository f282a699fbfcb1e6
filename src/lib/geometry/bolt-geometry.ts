/**
 * ISO metric bolt and thread geometry.
 * Dimensions in millimeters: DIN 13 / DIN ISO 68-1 (thread), DIN 931 / DIN 933 (bolt),
 * DIN 125 (washer), EN 20273 (clearance holes).
 */

/** Per-diameter constants a geometry is built from. */
export interface BoltGeometryBase {
  /** Nominal diameter */
  D: number;
  /** Thread pitch */
  P: number;
  /** Wrench size */
  s: number;
  /** Height of bolt head and nut */
  k: number;
  /** Maximum distance from bolt head to thread */
  a: number;
  /** Diameter of washer clearance hole */
  du1: number;
  /** Washer diameter */
  du2: number;
  /** Washer thickness */
  u: number;
  /** Fine clearance hole diameter (H12) */
  dh1?: number;
  /** Medium clearance hole diameter (H13) */
  dh2?: number;
  /** Coarse clearance hole diameter (H14) */
  dh3?: number;
  /** Default grip length of a bolt assembly */
  dgl: number;
  /** Customary bolt lengths, ascending */
  cls: readonly number[];
}

export interface BoltGeometry extends Readonly<BoltGeometryBase> {
  /** Effective pitch diameter */
  readonly d2: number;
  /** Thread height */
  readonly H: number;
  /** Nominal circumference */
  readonly C: number;
  /** Thread helix angle in degrees */
  readonly beta: number;
  /** Minimum thread length for bolt lengths < 125 mm */
  readonly b2: number;
  /** Minimum thread length for bolt lengths < 200 mm */
  readonly b3: number;
  /** Minimum thread length for bolt lengths >= 200 mm */
  readonly b4: number;
}

/** Thread-only view of a geometry. */
export interface ThreadGeometry {
  readonly D: number;
  readonly P: number;
  /** Nominal circumference */
  readonly u: number;
  /** Thread helix angle in degrees */
  readonly beta: number;
}

const SQRT3 = Math.sqrt(3);

/**
 * Helix angle in degrees of a thread with pitch P on circumference C.
 */
export function helixAngle(P: number, C: number): number {
  return (Math.atan2(P, C) * 180) / Math.PI;
}

/**
 * Build a frozen bolt geometry, computing the derived dimensions.
 */
export function createBoltGeometry(base: BoltGeometryBase): BoltGeometry {
  const { D, P } = base;
  const C = Math.PI * D;
  return Object.freeze({
    ...base,
    cls: Object.freeze([...base.cls]),
    d2: D - ((3 * SQRT3) / 8) * P,
    H: (SQRT3 / 2) * P,
    C,
    beta: helixAngle(P, C),
    b2: 2 * D + 6,
    b3: 2 * D + 12,
    b4: 2 * D + 25,
  });
}

export function createThreadGeometry(D: number, P: number): ThreadGeometry {
  const u = Math.PI * D;
  return Object.freeze({ D, P, u, beta: helixAngle(P, u) });
}

export function describeBoltGeometry(g: BoltGeometry): string {
  return `[M${g.D} P=${g.P}, C=${g.C.toFixed(4)}, beta=${g.beta.toFixed(4)}]`;
}
