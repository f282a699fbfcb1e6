import { describe, it, expect } from "vitest";
import { dumpAsset, dumpMaterial, dumpMaterialDocument, dumpProperties } from "./material-dump.js";
import { bumpMap, materialDocument, templateMaterial } from "../../test/fixtures.js";

describe("dumpProperties", () => {
  it("renders every property kind", () => {
    expect(
      dumpProperties([
        { kind: "string", name: "keyword", value: "thread" },
        { kind: "double", name: "angle", value: 87.5 },
        { kind: "distance", name: "scale", value: 0.25 },
        { kind: "boolean", name: "lock", value: false },
        { kind: "reference", name: "texture", value: "17" },
        {
          kind: "list",
          name: "layers",
          value: [{ kind: "string", name: "layer", value: "base" }],
        },
      ])
    ).toEqual([
      'keyword (string): "thread"',
      "angle (double): 87.5",
      "scale (distance): 0.25 in",
      "lock (boolean): false",
      "texture (reference): #17",
      "layers (list): 1 item",
      '  layer (string): "base"',
    ]);
  });

  it("nests connected assets one level deeper", () => {
    const lines = dumpProperties([{ kind: "asset", name: "generic_bump_map", value: bumpMap() }], 1);
    expect(lines[0]).toBe("  generic_bump_map (asset): Bump gradient [GradientSchema]");
    expect(lines[1]).toBe('    BaseSchema (string): "GradientSchema"');
    expect(lines).toHaveLength(8);
  });
});

describe("dumpAsset", () => {
  it("starts with an asset header", () => {
    expect(dumpAsset({ name: "Empty", schema: "GenericSchema", properties: [] })).toEqual([
      "<Asset Properties> Empty [GenericSchema]",
    ]);
  });
});

describe("dumpMaterial", () => {
  it("lists document, parameters and appearance", () => {
    const material = templateMaterial("Steel", { withBumpMap: false });
    material.parameters = { manufacturer: "test-author" };
    expect(dumpMaterial(material)).toEqual([
      'Material "MBolt - Steel - Thread template" (tpl-steel)',
      "  document: Test Family",
      "  manufacturer: test-author",
      "  <Asset Properties> Template appearance [GenericSchema]",
      '    description (string): "Template appearance"',
      '    keyword (string): "thread"',
      "    generic_glossiness (double): 0.5",
    ]);
  });

  it("marks materials without appearance or document", () => {
    expect(dumpMaterial({ id: "m1", name: "Bare", parameters: {} })).toEqual([
      'Material "Bare" (m1)',
      "  document: <none>",
      "  <no appearance asset>",
    ]);
  });
});

describe("dumpMaterialDocument", () => {
  it("separates materials by blank lines", () => {
    const doc = materialDocument([
      { id: "a", name: "A", parameters: {} },
      { id: "b", name: "B", parameters: {} },
    ]);
    expect(dumpMaterialDocument(doc)).toBe(
      [
        'Document "Test Family"',
        "",
        'Material "A" (a)',
        "  document: <none>",
        "  <no appearance asset>",
        "",
        'Material "B" (b)',
        "  document: <none>",
        "  <no appearance asset>",
        "",
      ].join("\n")
    );
  });
});
