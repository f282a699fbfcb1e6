import type { CatalogDelimiter } from "../constants.js";
import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import { formatFixed } from "../formatting.js";
import { lengthColumn, renderTable, type Cell, type Column, type TableRow } from "./table.js";

// Grip-to-length ------------------------------------------------------------

export const MAX_GRIP_LENGTH = 600;

export interface GripToLengthRow {
  D: number;
  grip: number;
  length: number;
}

/** Grip length sampling step: 2 mm below 23, 5 mm below 100, 10 mm above. */
export function gripStep(grip: number): number {
  if (grip < 23) return 2;
  if (grip < 100) return 5;
  return 10;
}

/**
 * Shortest customary bolt length strictly longer than grip + 2 nuts/heads + 2 washers.
 */
export function boltLengthForGrip(geometry: BoltGeometry, grip: number): number | undefined {
  const minLength = grip + 2 * geometry.k + 2 * geometry.u;
  return geometry.cls.find((l) => l > minLength);
}

export function gripToLengthRows(geometries: readonly BoltGeometry[]): GripToLengthRow[] {
  const rows: GripToLengthRow[] = [];
  for (const g of geometries) {
    for (let grip = 0; grip <= MAX_GRIP_LENGTH; grip++) {
      if (grip % gripStep(grip) !== 0) {
        continue;
      }
      const length = boltLengthForGrip(g, grip);
      if (length !== undefined) {
        rows.push({ D: g.D, grip, length });
      }
    }
  }
  return rows;
}

export const GRIP_TO_LENGTH_COLUMNS: readonly Column[] = [
  lengthColumn("D"),
  lengthColumn("LG"),
  lengthColumn("l"),
];

export function renderGripToLengthTable(
  geometries: readonly BoltGeometry[],
  delimiter: CatalogDelimiter
): string {
  const rows: TableRow[] = gripToLengthRows(geometries).map((r) => ({
    name: `M${r.D} x ]${r.grip}[`,
    cells: [r.D, r.grip, r.length],
  }));
  return renderTable(GRIP_TO_LENGTH_COLUMNS, rows, delimiter);
}

// Diameter banding ------------------------------------------------------------

export interface DiameterBandRow {
  D: number;
  nominal: number;
}

/**
 * Registered diameter closest to D; on a tie the lower one wins.
 */
export function nearestNominalDiameter(D: number, diameters: readonly number[]): number {
  const sorted = [...diameters].sort((a, b) => a - b);
  if (sorted.length === 0) {
    throw new Error("No nominal diameters registered");
  }
  let lower: number | undefined;
  let upper: number | undefined;
  for (const d of sorted) {
    if (d <= D) lower = d;
    if (d >= D && upper === undefined) upper = d;
  }
  if (lower === undefined) return sorted[0];
  if (upper === undefined) return lower;
  return upper - D < D - lower ? upper : lower;
}

/**
 * One row per integer diameter from the smallest to the largest registered one.
 */
export function diameterBandingRows(geometries: readonly BoltGeometry[]): DiameterBandRow[] {
  const diameters = geometries.map((g) => g.D);
  if (diameters.length === 0) {
    return [];
  }
  const from = Math.min(...diameters);
  const to = Math.max(...diameters);
  const rows: DiameterBandRow[] = [];
  for (let D = from; D <= to; D++) {
    rows.push({ D, nominal: nearestNominalDiameter(D, diameters) });
  }
  return rows;
}

export const DIAMETER_BANDING_COLUMNS: readonly Column[] = [lengthColumn("ND"), lengthColumn("D")];

export function renderDiameterBandingTable(
  geometries: readonly BoltGeometry[],
  delimiter: CatalogDelimiter
): string {
  const rows: TableRow[] = diameterBandingRows(geometries).map((r) => ({
    name: `D=${r.D}`,
    cells: [r.D, r.nominal],
  }));
  return renderTable(DIAMETER_BANDING_COLUMNS, rows, delimiter);
}

// Geometry parameters ------------------------------------------------------------

export interface GeometryParameter {
  key: string;
  /** Column heading in the HTML table */
  html: string;
  value: (g: BoltGeometry) => Cell;
}

export const GEOMETRY_PARAMETERS: readonly GeometryParameter[] = [
  { key: "D", html: "D", value: (g) => g.D },
  { key: "P", html: "P", value: (g) => g.P },
  { key: "H", html: "H", value: (g) => formatFixed(g.H) },
  { key: "d2", html: "d<sub>2</sub>", value: (g) => formatFixed(g.d2) },
  { key: "s", html: "s", value: (g) => g.s },
  { key: "k", html: "k", value: (g) => g.k },
  { key: "a", html: "a", value: (g) => g.a },
  { key: "b2", html: "b<sub>2</sub>", value: (g) => g.b2 },
  { key: "b3", html: "b<sub>3</sub>", value: (g) => g.b3 },
  { key: "b4", html: "b<sub>4</sub>", value: (g) => g.b4 },
  { key: "du1", html: "d<sub>u1</sub>", value: (g) => g.du1 },
  { key: "du2", html: "d<sub>u2</sub>", value: (g) => g.du2 },
  { key: "u", html: "u", value: (g) => g.u },
  { key: "dh1", html: "d<sub>h1</sub>", value: (g) => g.dh1 },
  { key: "dh2", html: "d<sub>h2</sub>", value: (g) => g.dh2 },
  { key: "dh3", html: "d<sub>h3</sub>", value: (g) => g.dh3 },
];

export function geometryParameterRows(geometries: readonly BoltGeometry[]): TableRow[] {
  return geometries.map((g) => ({
    name: `M${g.D}`,
    cells: GEOMETRY_PARAMETERS.map((p) => p.value(g)),
  }));
}

export function renderGeometryParameterTable(
  geometries: readonly BoltGeometry[],
  delimiter: CatalogDelimiter
): string {
  const columns = GEOMETRY_PARAMETERS.map((p) => lengthColumn(p.key));
  return renderTable(columns, geometryParameterRows(geometries), delimiter);
}
