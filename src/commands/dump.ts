import { Command, Flags } from "@oclif/core";
import { resolve } from "node:path";
import { Output } from "../lib/output.js";
import { loadMaterialDocument } from "../lib/store/material-document.js";
import { dumpMaterialDocument } from "../lib/store/material-dump.js";
import type { MaterialDocument } from "../lib/store/types.js";
import { NodeFileSink } from "../lib/file-sink.js";
import { formatErrorChain } from "../lib/errors.js";

export default class Dump extends Command {
  static description = "Dump all materials of a material document with their appearance assets";

  static examples = [
    "<%= config.bin %> dump --document materials.yaml",
    "<%= config.bin %> dump --document materials.yaml --out materials.txt",
  ];

  static flags = {
    document: Flags.string({
      char: "d",
      description: "Material document (YAML)",
      required: true,
    }),
    out: Flags.string({
      char: "o",
      description: "Write the dump to this file instead of stdout",
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Dump);
    const out = new Output({ verbose: false });

    let doc: MaterialDocument;
    try {
      doc = await loadMaterialDocument(resolve(flags.document));
    } catch (error) {
      out.error(formatErrorChain(error));
      return this.exit(1);
    }

    const text = dumpMaterialDocument(doc);
    if (!flags.out) {
      process.stdout.write(text);
      return;
    }

    const target = resolve(flags.out);
    try {
      const outcome = await new NodeFileSink().write(target, text, true);
      out.success(`Dump ${outcome}: ${target}`);
    } catch (error) {
      out.error(formatErrorChain(error));
      return this.exit(1);
    }
  }
}
