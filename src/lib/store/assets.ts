import type { Asset, AssetProperty, AssetPropertyKind } from "./types.js";

export const BUMP_MAP_PROPERTIES = ["generic_bump_map", "metal_pattern_shader"] as const;
export const GRADIENT_SCHEMA = "GradientSchema";

export type PropertyOfKind<K extends AssetPropertyKind> = Extract<AssetProperty, { kind: K }>;

export function findProperty(asset: Asset, name: string): AssetProperty | undefined {
  return asset.properties.find((p) => p.name === name);
}

/**
 * Property `name` of the given kind, or undefined when missing or of another kind.
 */
export function findPropertyOfKind<K extends AssetPropertyKind>(
  asset: Asset,
  name: string,
  kind: K
): PropertyOfKind<K> | undefined {
  const property = findProperty(asset, name);
  if (property && isKind(property, kind)) {
    return property;
  }
  return undefined;
}

function isKind<K extends AssetPropertyKind>(
  property: AssetProperty,
  kind: K
): property is PropertyOfKind<K> {
  return property.kind === kind;
}

export function isGradientMap(asset: Asset): boolean {
  return findPropertyOfKind(asset, "BaseSchema", "string")?.value === GRADIENT_SCHEMA;
}

/**
 * The connected bump gradient map of an appearance asset, if any.
 */
export function findBumpGradientMap(appearance: Asset): Asset | undefined {
  for (const name of BUMP_MAP_PROPERTIES) {
    const connected = findPropertyOfKind(appearance, name, "asset");
    if (connected && isGradientMap(connected.value)) {
      return connected.value;
    }
  }
  return undefined;
}
