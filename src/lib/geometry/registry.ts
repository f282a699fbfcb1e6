import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { z } from "zod";
import {
  createBoltGeometry,
  createThreadGeometry,
  type BoltGeometry,
  type BoltGeometryBase,
  type ThreadGeometry,
} from "./bolt-geometry.js";
import { GeometryNotFoundError } from "../errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Bundled ISO metric coarse-thread table. */
export const GEOMETRY_DATA_PATH = join(__dirname, "../../../data/iso-metric-bolts.json");

const dimension = z.number().positive();

const rowSchema = z.object({
  D: z.number().int().positive(),
  P: dimension,
  s: dimension,
  k: dimension,
  a: dimension,
  du1: dimension,
  du2: dimension,
  u: dimension,
  dh1: dimension.optional(),
  dh2: dimension.optional(),
  dh3: dimension.optional(),
  dgl: dimension,
  cls: z
    .array(dimension)
    .min(1)
    .refine((lengths) => lengths.every((l, i) => i === 0 || l > lengths[i - 1]), {
      message: "customary lengths must be strictly ascending",
    }),
});

const dataSchema = z.object({
  rows: z.array(rowSchema).min(1),
});

/**
 * Parse and validate raw geometry table data.
 */
export function parseGeometryData(raw: unknown): BoltGeometryBase[] {
  const result = dataSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.join(".");
    throw new Error(`Invalid geometry data at "${where}": ${issue.message}`);
  }
  return result.data.rows;
}

/**
 * Read the geometry table data file.
 */
export function readGeometryData(path: string = GEOMETRY_DATA_PATH): BoltGeometryBase[] {
  const content = readFileSync(path, "utf-8");
  return parseGeometryData(JSON.parse(content));
}

export type GeometryLookup =
  | { ok: true; geometry: BoltGeometry }
  | { ok: false; error: GeometryNotFoundError };

/**
 * Registry of bolt geometries keyed by nominal diameter.
 * Entries are built on first access and never change afterwards.
 */
export class GeometryTable {
  private bolts: Map<number, BoltGeometry> | null = null;
  private threads: ThreadGeometry[] | null = null;

  constructor(private readonly source: () => readonly BoltGeometryBase[]) {}

  /**
   * Table over a fixed list of rows.
   */
  static of(rows: readonly BoltGeometryBase[]): GeometryTable {
    return new GeometryTable(() => rows);
  }

  getBoltGeometries(): readonly BoltGeometry[] {
    return [...this.entries().values()];
  }

  getThreadGeometries(): readonly ThreadGeometry[] {
    if (!this.threads) {
      this.threads = this.getBoltGeometries().map((g) => createThreadGeometry(g.D, g.P));
    }
    return this.threads;
  }

  get(D: number): GeometryLookup {
    const geometry = this.entries().get(D);
    if (!geometry) {
      return { ok: false, error: new GeometryNotFoundError(D) };
    }
    return { ok: true, geometry };
  }

  /**
   * Like get(), throwing GeometryNotFoundError for unknown diameters.
   */
  require(D: number): BoltGeometry {
    const lookup = this.get(D);
    if (!lookup.ok) {
      throw lookup.error;
    }
    return lookup.geometry;
  }

  has(D: number): boolean {
    return this.entries().has(D);
  }

  /** Registered nominal diameters in registration order. */
  diameters(): number[] {
    return [...this.entries().keys()];
  }

  get size(): number {
    return this.entries().size;
  }

  private entries(): Map<number, BoltGeometry> {
    if (!this.bolts) {
      const bolts = new Map<number, BoltGeometry>();
      for (const row of this.source()) {
        if (bolts.has(row.D)) {
          throw new Error(`Duplicate nominal diameter M${row.D} in geometry table`);
        }
        bolts.set(row.D, createBoltGeometry(row));
      }
      this.bolts = bolts;
    }
    return this.bolts;
  }
}

let defaultTable: GeometryTable | null = null;

/**
 * The bundled ISO metric table, loaded on first use.
 */
export function defaultGeometryTable(): GeometryTable {
  if (!defaultTable) {
    defaultTable = new GeometryTable(() => readGeometryData());
  }
  return defaultTable;
}
