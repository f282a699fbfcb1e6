import type { BoltGeometry } from "../geometry/bolt-geometry.js";

/**
 * Appearance asset property. Distances are stored in inches.
 */
export type AssetProperty =
  | { kind: "string"; name: string; value: string }
  | { kind: "double"; name: string; value: number }
  | { kind: "distance"; name: string; value: number }
  | { kind: "boolean"; name: string; value: boolean }
  | { kind: "reference"; name: string; value: string }
  | { kind: "asset"; name: string; value: Asset }
  | { kind: "list"; name: string; value: AssetProperty[] };

export type AssetPropertyKind = AssetProperty["kind"];

export interface Asset {
  name: string;
  /** e.g. GenericSchema, MetalSchema, GradientSchema */
  schema: string;
  properties: AssetProperty[];
}

export interface MaterialRecord {
  id: string;
  name: string;
  /** Title of the owning document */
  document?: string;
  /** Free-text parameters: manufacturer, comments, url, description */
  parameters: Record<string, string>;
  appearance?: Asset;
}

export interface MaterialDocument {
  title: string;
  materials: MaterialRecord[];
}

/**
 * Store holding template and derived materials.
 */
export interface ArtifactStore {
  /** Exact name for a string, pattern match for a RegExp */
  find(filter: string | RegExp): MaterialRecord[];
  /** Duplicate `template` as `name`, adjusted for `geometry`. Throws on failure. */
  create(template: MaterialRecord, name: string, geometry: BoltGeometry): MaterialRecord;
  /** Throws on failure */
  delete(ref: MaterialRecord): void;
}

/**
 * All-or-nothing scope around a batch of store mutations.
 */
export interface TransactionScope {
  run<T>(name: string, body: () => T): T;
}
