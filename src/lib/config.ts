import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import {
  CATALOG_DELIMITERS,
  CONFIG_FILE,
  DEFAULT_AUTHOR,
  DEFAULT_FILES,
  DEFAULT_MATERIALS,
  type CatalogDelimiter,
  type OutputFileKey,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { fileExists } from "./file-sink.js";
import { DEFAULT_NAME_PREFIX } from "./naming/name-codec.js";

export interface IsoboltConfig {
  namePrefix: string;
  materials: string[];
  delimiter: CatalogDelimiter;
  files: Record<OutputFileKey, string>;
  author: string;
  repositoryUrl: string;
}

const nameSegment = z
  .string()
  .trim()
  .min(1)
  .refine((s) => !s.includes(" - "), { message: 'must not contain " - "' })
  .refine((s) => !/[,;]/.test(s), { message: "must not contain a catalog delimiter" });

const fileName = z
  .string()
  .min(1)
  .refine((s) => !/[\\/]/.test(s), { message: "must be a file name, not a path" });

const configSchema = z
  .object({
    namePrefix: nameSegment.default(DEFAULT_NAME_PREFIX),
    materials: z.array(nameSegment).min(1).default([...DEFAULT_MATERIALS]),
    delimiter: z.enum(CATALOG_DELIMITERS).default(","),
    files: z
      .object({
        boltCatalog: fileName.default(DEFAULT_FILES.boltCatalog),
        assemblyCatalog: fileName.default(DEFAULT_FILES.assemblyCatalog),
        gripToLength: fileName.default(DEFAULT_FILES.gripToLength),
        geometry: fileName.default(DEFAULT_FILES.geometry),
        diameters: fileName.default(DEFAULT_FILES.diameters),
        geometryHtml: fileName.default(DEFAULT_FILES.geometryHtml),
      })
      .strict()
      .default({}),
    author: z.string().default(DEFAULT_AUTHOR),
    repositoryUrl: z.string().url().or(z.literal("")).default(""),
  })
  .strict();

/**
 * Validate a parsed configuration object, filling in defaults.
 */
export function parseConfig(raw: unknown, source: string = "<config>"): IsoboltConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(`Invalid configuration in ${source} at "${where}": ${issue.message}`);
  }
  return result.data;
}

export function defaultConfig(): IsoboltConfig {
  return parseConfig({});
}

/**
 * Load the configuration file. Without an explicit path, a missing
 * isobolt.config.yaml in `cwd` yields the defaults.
 */
export async function loadConfig(path?: string, cwd: string = process.cwd()): Promise<IsoboltConfig> {
  const target = resolve(cwd, path ?? CONFIG_FILE);
  if (!path && !(await fileExists(target))) {
    return defaultConfig();
  }

  let content: string;
  try {
    content = await readFile(target, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file "${target}"`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Configuration file "${target}" is not valid YAML`, { cause: error });
  }
  return parseConfig(raw, target);
}
