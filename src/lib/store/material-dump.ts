import type { Asset, AssetProperty, MaterialDocument, MaterialRecord } from "./types.js";

/**
 * Visitor over asset properties, one method per property kind.
 */
export interface AssetPropertyVisitor<R> {
  string(property: Extract<AssetProperty, { kind: "string" }>): R;
  double(property: Extract<AssetProperty, { kind: "double" }>): R;
  distance(property: Extract<AssetProperty, { kind: "distance" }>): R;
  boolean(property: Extract<AssetProperty, { kind: "boolean" }>): R;
  reference(property: Extract<AssetProperty, { kind: "reference" }>): R;
  asset(property: Extract<AssetProperty, { kind: "asset" }>): R;
  list(property: Extract<AssetProperty, { kind: "list" }>): R;
}

export function visitProperty<R>(property: AssetProperty, visitor: AssetPropertyVisitor<R>): R {
  switch (property.kind) {
    case "string":
      return visitor.string(property);
    case "double":
      return visitor.double(property);
    case "distance":
      return visitor.distance(property);
    case "boolean":
      return visitor.boolean(property);
    case "reference":
      return visitor.reference(property);
    case "asset":
      return visitor.asset(property);
    case "list":
      return visitor.list(property);
  }
}

const INDENT = "  ";

/**
 * Renders properties as "name (kind): value" lines, nested assets and lists one level deeper.
 */
class PropertyDumper implements AssetPropertyVisitor<string[]> {
  constructor(private readonly depth: number) {}

  string(p: Extract<AssetProperty, { kind: "string" }>): string[] {
    return [this.line(p.name, "string", JSON.stringify(p.value))];
  }

  double(p: Extract<AssetProperty, { kind: "double" }>): string[] {
    return [this.line(p.name, "double", String(p.value))];
  }

  distance(p: Extract<AssetProperty, { kind: "distance" }>): string[] {
    return [this.line(p.name, "distance", `${p.value} in`)];
  }

  boolean(p: Extract<AssetProperty, { kind: "boolean" }>): string[] {
    return [this.line(p.name, "boolean", String(p.value))];
  }

  reference(p: Extract<AssetProperty, { kind: "reference" }>): string[] {
    return [this.line(p.name, "reference", `#${p.value}`)];
  }

  asset(p: Extract<AssetProperty, { kind: "asset" }>): string[] {
    return [
      this.line(p.name, "asset", `${p.value.name} [${p.value.schema}]`),
      ...dumpProperties(p.value.properties, this.depth + 1),
    ];
  }

  list(p: Extract<AssetProperty, { kind: "list" }>): string[] {
    return [
      this.line(p.name, "list", `${p.value.length} item${p.value.length === 1 ? "" : "s"}`),
      ...dumpProperties(p.value, this.depth + 1),
    ];
  }

  private line(name: string, kind: string, value: string): string {
    return `${INDENT.repeat(this.depth)}${name} (${kind}): ${value}`;
  }
}

export function dumpProperties(properties: readonly AssetProperty[], depth: number = 0): string[] {
  const dumper = new PropertyDumper(depth);
  return properties.flatMap((p) => visitProperty(p, dumper));
}

export function dumpAsset(asset: Asset, depth: number = 0): string[] {
  return [
    `${INDENT.repeat(depth)}<Asset Properties> ${asset.name} [${asset.schema}]`,
    ...dumpProperties(asset.properties, depth + 1),
  ];
}

export function dumpMaterial(material: MaterialRecord): string[] {
  const lines = [`Material "${material.name}" (${material.id})`];
  lines.push(`${INDENT}document: ${material.document ?? "<none>"}`);
  for (const [key, value] of Object.entries(material.parameters)) {
    lines.push(`${INDENT}${key}: ${value}`);
  }
  if (material.appearance) {
    lines.push(...dumpAsset(material.appearance, 1));
  } else {
    lines.push(`${INDENT}<no appearance asset>`);
  }
  return lines;
}

/**
 * Text dump of every material in a document, separated by blank lines.
 */
export function dumpMaterialDocument(doc: MaterialDocument): string {
  const blocks = doc.materials.map((m) => dumpMaterial(m).join("\n"));
  return [`Document "${doc.title}"`, "", ...blocks.flatMap((b) => [b, ""])].join("\n");
}
