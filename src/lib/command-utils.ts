import { Flags } from "@oclif/core";
import { resolve } from "node:path";
import type { Output } from "./output.js";
import { loadConfig, type IsoboltConfig } from "./config.js";
import { NameCodec } from "./naming/name-codec.js";
import { NodeFileSink, type TextFileSink } from "./file-sink.js";
import { PassLog } from "./pass-log.js";
import { formatErrorChain } from "./errors.js";

/**
 * Flags shared by the catalogs and materials commands.
 */
export const commonFlags = {
  config: Flags.string({
    char: "c",
    description: "Configuration file (default: isobolt.config.yaml if present)",
  }),
  log: Flags.string({
    char: "l",
    description: "Write the pass log to this file",
  }),
  verbose: Flags.boolean({
    char: "v",
    description: "Show detailed progress and the pass log",
    default: false,
  }),
};

/**
 * Load configuration, reporting failures through `out`. Returns null on error.
 */
export async function loadCommandConfig(
  path: string | undefined,
  out: Output
): Promise<IsoboltConfig | null> {
  try {
    const config = await loadConfig(path);
    out.info(`Name prefix: ${config.namePrefix}, materials: ${config.materials.join(", ")}`);
    return config;
  } catch (error) {
    out.error(formatErrorChain(error));
    return null;
  }
}

export function createCodec(config: IsoboltConfig): NameCodec {
  return new NameCodec(config.namePrefix);
}

/**
 * Pass log echoing to `out` in verbose mode.
 */
export function createPassLog(out: Output): PassLog {
  const log = new PassLog();
  log.addSink(out.logSink());
  return log;
}

/**
 * Write the pass log when a log file was requested. A failed write is reported, not thrown.
 */
export async function writePassLog(
  log: PassLog,
  path: string | undefined,
  out: Output,
  sink: TextFileSink = new NodeFileSink()
): Promise<void> {
  if (!path) {
    return;
  }
  const target = resolve(path);
  try {
    await sink.write(target, log.text(), true);
    out.info(`Log written to ${target}`);
  } catch (error) {
    out.warn(formatErrorChain(error));
  }
}
