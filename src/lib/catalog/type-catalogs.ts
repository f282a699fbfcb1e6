import type { CatalogDelimiter } from "../constants.js";
import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import type { NameCodec } from "../naming/name-codec.js";
import { lengthColumn, otherColumn, renderTable, type Column, type TableRow } from "./table.js";

/** Shank variants are only offered above this length (mm). */
export const SHANK_MIN_LENGTH = 50;

export interface CatalogOptions {
  codec: NameCodec;
  materials: readonly string[];
  delimiter: CatalogDelimiter;
}

export interface BoltCatalogRow {
  name: string;
  D: number;
  length: number;
  shank: boolean;
  material: string;
  threadMaterial: string;
}

export interface AssemblyCatalogRow {
  name: string;
  D: number;
  gripLength: number;
  shank: boolean;
  material: string;
  threadMaterial: string;
}

const SHANK_OPTIONS = [false, true] as const;

export const BOLT_CATALOG_COLUMNS: readonly Column[] = [
  lengthColumn("Nominal Diameter"),
  lengthColumn("Length"),
  otherColumn("Shank"),
  otherColumn("Material"),
  otherColumn("Thread Material"),
];

export const ASSEMBLY_CATALOG_COLUMNS: readonly Column[] = [
  lengthColumn("Nominal Diameter"),
  lengthColumn("Grip Length"),
  otherColumn("Shank"),
  otherColumn("Material"),
  otherColumn("Thread Material"),
];

function shankSuffix(shank: boolean): string {
  return shank ? " w/shank" : "";
}

/**
 * geometry × customary length × shank × material; shank rows only for lengths above 50 mm.
 */
export function boltCatalogRows(
  geometries: readonly BoltGeometry[],
  options: Pick<CatalogOptions, "codec" | "materials">
): BoltCatalogRow[] {
  const { codec, materials } = options;
  const rows: BoltCatalogRow[] = [];
  for (const g of geometries) {
    for (const length of g.cls) {
      for (const shank of SHANK_OPTIONS) {
        if (shank && length <= SHANK_MIN_LENGTH) {
          continue;
        }
        for (const m of materials) {
          rows.push({
            name: `M${g.D} x ${length}${shankSuffix(shank)} ${m}`,
            D: g.D,
            length,
            shank,
            material: codec.encodePlain(m),
            threadMaterial: codec.encode(m, g.D),
          });
        }
      }
    }
  }
  return rows;
}

/**
 * geometry × shank × material at the default grip length; shank rows only when it exceeds 50 mm.
 */
export function assemblyCatalogRows(
  geometries: readonly BoltGeometry[],
  options: Pick<CatalogOptions, "codec" | "materials">
): AssemblyCatalogRow[] {
  const { codec, materials } = options;
  const rows: AssemblyCatalogRow[] = [];
  for (const g of geometries) {
    for (const shank of SHANK_OPTIONS) {
      if (shank && g.dgl <= SHANK_MIN_LENGTH) {
        continue;
      }
      for (const m of materials) {
        rows.push({
          name: `M${g.D}${shankSuffix(shank)} ${m}`,
          D: g.D,
          gripLength: g.dgl,
          shank,
          material: codec.encodePlain(m),
          threadMaterial: codec.encode(m, g.D),
        });
      }
    }
  }
  return rows;
}

export function renderBoltCatalog(geometries: readonly BoltGeometry[], options: CatalogOptions): string {
  const rows: TableRow[] = boltCatalogRows(geometries, options).map((r) => ({
    name: r.name,
    cells: [r.D, r.length, r.shank ? 1 : 0, r.material, r.threadMaterial],
  }));
  return renderTable(BOLT_CATALOG_COLUMNS, rows, options.delimiter);
}

export function renderAssemblyCatalog(
  geometries: readonly BoltGeometry[],
  options: CatalogOptions
): string {
  const rows: TableRow[] = assemblyCatalogRows(geometries, options).map((r) => ({
    name: r.name,
    cells: [r.D, r.gripLength, r.shank ? 1 : 0, r.material, r.threadMaterial],
  }));
  return renderTable(ASSEMBLY_CATALOG_COLUMNS, rows, options.delimiter);
}
