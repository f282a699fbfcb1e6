import { readFile, writeFile } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { z } from "zod";
import type { Asset, AssetProperty, MaterialDocument } from "./types.js";

const assetSchema: z.ZodType<Asset> = z.lazy(() =>
  z.object({
    name: z.string(),
    schema: z.string(),
    properties: z.array(propertySchema),
  })
);

const propertySchema: z.ZodType<AssetProperty> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("string"), name: z.string(), value: z.string() }),
    z.object({ kind: z.literal("double"), name: z.string(), value: z.number() }),
    z.object({ kind: z.literal("distance"), name: z.string(), value: z.number() }),
    z.object({ kind: z.literal("boolean"), name: z.string(), value: z.boolean() }),
    z.object({ kind: z.literal("reference"), name: z.string(), value: z.string() }),
    z.object({ kind: z.literal("asset"), name: z.string(), value: assetSchema }),
    z.object({ kind: z.literal("list"), name: z.string(), value: z.array(propertySchema) }),
  ])
);

const materialSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  document: z.string().optional(),
  parameters: z.record(z.string()).default({}),
  appearance: assetSchema.optional(),
});

const documentSchema = z
  .object({
    title: z.string().min(1),
    materials: z.array(materialSchema).default([]),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.materials.forEach((m, i) => {
      if (seen.has(m.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["materials", i, "id"],
          message: `Duplicate material id "${m.id}"`,
        });
      }
      seen.add(m.id);
    });
  });

/**
 * Validate parsed YAML as a material document.
 */
export function parseMaterialDocument(raw: unknown, source: string = "<input>"): MaterialDocument {
  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid material document ${source} at "${issue.path.join(".")}": ${issue.message}`);
  }
  return result.data;
}

export async function loadMaterialDocument(path: string): Promise<MaterialDocument> {
  const content = await readFile(path, "utf-8");
  return parseMaterialDocument(parse(content), path);
}

export function serializeMaterialDocument(doc: MaterialDocument): string {
  return stringify(doc, { lineWidth: 0 });
}

export async function saveMaterialDocument(path: string, doc: MaterialDocument): Promise<void> {
  await writeFile(path, serializeMaterialDocument(doc), "utf-8");
}
