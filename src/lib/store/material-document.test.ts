import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  loadMaterialDocument,
  parseMaterialDocument,
  saveMaterialDocument,
} from "./material-document.js";
import { materialDocument, templateMaterial } from "../../test/fixtures.js";
import { TemplateValidator } from "../validation/template-validator.js";
import { NameCodec } from "../naming/name-codec.js";

const SAMPLE_DOCUMENT = join(dirname(fileURLToPath(import.meta.url)), "../../../samples/materials.yaml");

describe("parseMaterialDocument", () => {
  it("accepts a document with nested assets and lists", () => {
    const doc = parseMaterialDocument({
      title: "Family",
      materials: [
        {
          id: "m1",
          name: "Plain",
          appearance: {
            name: "Look",
            schema: "GenericSchema",
            properties: [
              {
                kind: "list",
                name: "layers",
                value: [{ kind: "reference", name: "texture", value: "42" }],
              },
            ],
          },
        },
      ],
    });
    expect(doc.materials[0].parameters).toEqual({});
    expect(doc.materials[0].appearance?.properties[0]).toEqual({
      kind: "list",
      name: "layers",
      value: [{ kind: "reference", name: "texture", value: "42" }],
    });
  });

  it("defaults to an empty material list", () => {
    expect(parseMaterialDocument({ title: "Empty" })).toEqual({ title: "Empty", materials: [] });
  });

  it("rejects an unknown property kind", () => {
    expect(() =>
      parseMaterialDocument({
        title: "Family",
        materials: [
          {
            id: "m1",
            name: "Plain",
            appearance: { name: "Look", schema: "S", properties: [{ kind: "color", name: "c", value: 1 }] },
          },
        ],
      })
    ).toThrow(/materials\.0\.appearance\.properties\.0\.kind/);
  });

  it("rejects duplicate material ids", () => {
    expect(() =>
      parseMaterialDocument(
        {
          title: "Family",
          materials: [
            { id: "m1", name: "A" },
            { id: "m1", name: "B" },
          ],
        },
        "family.yaml"
      )
    ).toThrow('Invalid material document family.yaml at "materials.1.id": Duplicate material id "m1"');
  });
});

describe("loadMaterialDocument / saveMaterialDocument", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "isobolt-doc-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and loads a document", async () => {
    const path = join(dir, "family.yaml");
    const doc = materialDocument([templateMaterial("Steel galvanized")]);
    await saveMaterialDocument(path, doc);
    expect(await loadMaterialDocument(path)).toEqual(doc);
  });

  it("reads YAML written by hand", async () => {
    const path = join(dir, "hand.yaml");
    await writeFile(
      path,
      [
        "title: Hand made",
        "materials:",
        "  - id: m1",
        "    name: MBolt - Brass - Thread template",
        "    document: Hand made",
        "    parameters:",
        "      manufacturer: someone",
        "",
      ].join("\n")
    );
    const doc = await loadMaterialDocument(path);
    expect(doc.materials[0]).toEqual({
      id: "m1",
      name: "MBolt - Brass - Thread template",
      document: "Hand made",
      parameters: { manufacturer: "someone" },
    });
  });

  it("loads the sample document with one usable template", async () => {
    const doc = await loadMaterialDocument(SAMPLE_DOCUMENT);
    const validator = new TemplateValidator(new NameCodec());
    expect(doc.materials.map((m) => validator.validate(m).ok)).toEqual([true, false]);
  });
});
