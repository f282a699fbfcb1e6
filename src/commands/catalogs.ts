import { Command, Flags } from "@oclif/core";
import { resolve } from "node:path";
import { Output } from "../lib/output.js";
import { SCHEDULE_KINDS, isScheduleKind, type ScheduleKindType } from "../lib/constants.js";
import { commonFlags, createCodec, createPassLog, loadCommandConfig, writePassLog } from "../lib/command-utils.js";
import { defaultGeometryTable } from "../lib/geometry/registry.js";
import type { BoltGeometry } from "../lib/geometry/bolt-geometry.js";
import { NodeFileSink } from "../lib/file-sink.js";
import { ReadlinePrompt } from "../lib/prompt.js";
import { formatErrorChain } from "../lib/errors.js";
import {
  findExistingFiles,
  runSchedule,
  scheduleJobs,
  scheduleOptions,
  summarizeFileResults,
} from "../lib/catalog/schedules.js";

export default class Catalogs extends Command {
  static description =
    "Write type catalogs and lookup tables for the ISO metric bolt and bolt assembly families";

  static examples = [
    "<%= config.bin %> catalogs",
    "<%= config.bin %> catalogs --kind type-catalogs --out ./family",
    "<%= config.bin %> catalogs --kind lookup-tables --overwrite --log catalogs.log",
  ];

  static flags = {
    kind: Flags.string({
      char: "k",
      description: "Files to write (prompted for when omitted)",
      options: [...SCHEDULE_KINDS],
    }),
    out: Flags.string({
      char: "o",
      description: "Output directory",
      default: ".",
    }),
    overwrite: Flags.boolean({
      description: "Overwrite existing files",
      default: false,
    }),
    ...commonFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Catalogs);
    const out = new Output({ verbose: flags.verbose });

    const config = await loadCommandConfig(flags.config, out);
    if (!config) {
      return this.exit(1);
    }

    let geometries: readonly BoltGeometry[];
    try {
      geometries = defaultGeometryTable().getBoltGeometries();
    } catch (error) {
      out.error(formatErrorChain(error));
      return this.exit(1);
    }

    const log = createPassLog(out);
    log.begin("Catalogs and Tables");

    // Pre-checks: which target files exist already
    const dir = resolve(flags.out);
    const fileNames = Object.values(config.files);
    const existing = await findExistingFiles(dir, fileNames);
    log.line(`Output directory: ${dir}`);
    for (const name of fileNames) {
      log.line(`- ${name} (${existing.includes(name) ? "exists" : "does not exist"})`);
    }

    let kind: ScheduleKindType;
    let overwrite = flags.overwrite;
    if (flags.kind !== undefined && isScheduleKind(flags.kind)) {
      kind = flags.kind;
    } else {
      const choice = await new ReadlinePrompt().chooseSchedule({
        options: scheduleOptions(config.files, existing),
        existing: existing.length,
      });
      if (choice.schedule === "cancel") {
        log.line("- Cancelled by user");
        log.end();
        await writePassLog(log, flags.log, out);
        out.info("Cancelled");
        return;
      }
      kind = choice.schedule;
      overwrite = overwrite || choice.overwrite;
    }
    log.line(`- Schedule "${kind}" selected${overwrite ? " (overwrite existing)" : ""}`);

    const jobs = scheduleJobs(kind, {
      geometries,
      catalog: {
        codec: createCodec(config),
        materials: config.materials,
        delimiter: config.delimiter,
      },
      files: config.files,
    });
    const results = await runSchedule(jobs, { dir, sink: new NodeFileSink(), overwrite, log });
    const summary = summarizeFileResults(results);

    log.line();
    log.line("Wrap up");
    log.line(`- ${summary.headline}`);
    log.end();

    out.summary(summary);
    if (summary.level === "nothing") {
      out.info("Re-run with --overwrite to recreate the files.");
    }
    await writePassLog(log, flags.log, out);
  }
}
