import type { BoltGeometryBase } from "../lib/geometry/bolt-geometry.js";
import { GeometryTable } from "../lib/geometry/registry.js";
import { NameCodec } from "../lib/naming/name-codec.js";
import { DocumentStore } from "../lib/store/document-store.js";
import type { Asset, MaterialDocument, MaterialRecord } from "../lib/store/types.js";

export const DOCUMENT_TITLE = "Test Family";

export const M6: BoltGeometryBase = {
  D: 6, P: 1, s: 10, k: 4, a: 3, du1: 6.4, du2: 12, u: 1.6, dh1: 6.4, dh2: 6.6, dh3: 7, dgl: 50,
  cls: [6, 8, 10, 12, 14, 16, 18, 20, 22, 25, 28, 30, 35, 40, 45, 50, 55, 60],
};

export const M8: BoltGeometryBase = {
  D: 8, P: 1.25, s: 13, k: 5.5, a: 3.75, du1: 8.4, du2: 16, u: 1.6, dh1: 8.4, dh2: 9, dh3: 10, dgl: 50,
  cls: [8, 10, 12, 16, 20, 25, 30, 40, 50, 60],
};

export const M12: BoltGeometryBase = {
  D: 12, P: 1.75, s: 19, k: 8, a: 5.5, du1: 13, du2: 24, u: 2.5, dh1: 13, dh2: 13.5, dh3: 14.5, dgl: 100,
  cls: [10, 12, 16, 20, 25, 30, 40, 50, 60, 80, 100, 120, 150, 200, 300],
};

export function testTable(rows: readonly BoltGeometryBase[] = [M6, M8, M12]): GeometryTable {
  return GeometryTable.of(rows);
}

export function bumpMap(): Asset {
  return {
    name: "Bump gradient",
    schema: "GradientSchema",
    properties: [
      { kind: "string", name: "BaseSchema", value: "GradientSchema" },
      { kind: "distance", name: "texture_RealWorldScaleX", value: 1 },
      { kind: "distance", name: "texture_RealWorldScaleY", value: 1 },
      { kind: "double", name: "texture_WAngle", value: 0 },
      { kind: "boolean", name: "texture_ScaleLock", value: true },
      { kind: "boolean", name: "texture_URepeat", value: false },
      { kind: "boolean", name: "texture_VRepeat", value: false },
    ],
  };
}

export function appearance(withBumpMap: boolean = true): Asset {
  const properties: Asset["properties"] = [
    { kind: "string", name: "description", value: "Template appearance" },
    { kind: "string", name: "keyword", value: "thread" },
    { kind: "double", name: "generic_glossiness", value: 0.5 },
  ];
  if (withBumpMap) {
    properties.push({ kind: "asset", name: "generic_bump_map", value: bumpMap() });
  }
  return { name: "Template appearance", schema: "GenericSchema", properties };
}

export function templateMaterial(
  category: string,
  options: { id?: string; document?: string | null; withBumpMap?: boolean; prefix?: string } = {}
): MaterialRecord {
  const prefix = options.prefix ?? "MBolt";
  const material: MaterialRecord = {
    id: options.id ?? `tpl-${category.toLowerCase().replace(/\s+/g, "-")}`,
    name: `${prefix} - ${category} - Thread template`,
    parameters: {},
    appearance: appearance(options.withBumpMap ?? true),
  };
  if (options.document !== null) {
    material.document = options.document ?? DOCUMENT_TITLE;
  }
  return material;
}

export function materialDocument(materials: MaterialRecord[]): MaterialDocument {
  return { title: DOCUMENT_TITLE, materials };
}

export function testStore(doc: MaterialDocument, codec: NameCodec = new NameCodec()): DocumentStore {
  return new DocumentStore(doc, {
    codec,
    author: "test-author",
    repositoryUrl: "https://example.com/isobolt",
  });
}
