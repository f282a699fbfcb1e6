/**
 * Field type tags appended to catalog header fields.
 */
export const TypeTag = {
  Length: "##LENGTH##MILLIMETERS",
  Other: "##OTHER##",
} as const;

export type TypeTagValue = (typeof TypeTag)[keyof typeof TypeTag];

/**
 * File schedules of the catalogs command.
 */
export const ScheduleKind = {
  TypeCatalogs: "type-catalogs",
  LookupTables: "lookup-tables",
  GeometryHtml: "geometry-html",
} as const;

export type ScheduleKindType = (typeof ScheduleKind)[keyof typeof ScheduleKind];

export const SCHEDULE_KINDS: readonly ScheduleKindType[] = Object.values(ScheduleKind);

export function isScheduleKind(value: string): value is ScheduleKindType {
  return SCHEDULE_KINDS.some((kind) => kind === value);
}

/**
 * Default output file names, overridable through the configuration file.
 */
export const DEFAULT_FILES = {
  boltCatalog: "Generic ISO Metric Bolt.txt",
  assemblyCatalog: "Generic ISO Metric Bolt Assembly.txt",
  gripToLength: "ISOBolt G2L.csv",
  geometry: "ISOBolt MGeo.csv",
  diameters: "ISOBolt D2D.csv",
  geometryHtml: "ISOBolt MGeo.html",
} as const;

export type OutputFileKey = keyof typeof DEFAULT_FILES;

export const CONFIG_FILE = "isobolt.config.yaml";

export const DEFAULT_MATERIALS: readonly string[] = ["Steel galvanized"];

export const DEFAULT_AUTHOR = "isobolt";

export const CATALOG_DELIMITERS = [",", ";"] as const;

export type CatalogDelimiter = (typeof CATALOG_DELIMITERS)[number];
