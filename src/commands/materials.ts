import { Command, Flags } from "@oclif/core";
import { resolve } from "node:path";
import { Output } from "../lib/output.js";
import { commonFlags, createCodec, createPassLog, loadCommandConfig, writePassLog } from "../lib/command-utils.js";
import { defaultGeometryTable } from "../lib/geometry/registry.js";
import { DocumentStore } from "../lib/store/document-store.js";
import { loadMaterialDocument, saveMaterialDocument } from "../lib/store/material-document.js";
import type { MaterialDocument } from "../lib/store/types.js";
import { ReconciliationEngine, type ReconcileAction } from "../lib/reconcile/engine.js";
import { runReconciliationPass, type PassResult } from "../lib/reconcile/pass.js";
import { precheckLines } from "../lib/reconcile/summary.js";
import { ReadlinePrompt } from "../lib/prompt.js";
import { formatErrorChain } from "../lib/errors.js";

function parseMode(mode: string | undefined): ReconcileAction | undefined {
  return mode === "create" || mode === "delete" ? mode : undefined;
}

export default class Materials extends Command {
  static description =
    "Create, overwrite or delete thread materials in a material document from its thread templates";

  static examples = [
    "<%= config.bin %> materials --document materials.yaml",
    "<%= config.bin %> materials --document materials.yaml --mode create --overwrite",
    "<%= config.bin %> materials --document materials.yaml --mode delete --log materials.log",
  ];

  static flags = {
    document: Flags.string({
      char: "d",
      description: "Material document (YAML)",
      required: true,
    }),
    mode: Flags.string({
      char: "m",
      description: "Operation (prompted for when omitted)",
      options: ["create", "delete"],
    }),
    overwrite: Flags.boolean({
      description: "Overwrite existing thread materials when creating",
      default: false,
    }),
    ...commonFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Materials);
    const out = new Output({ verbose: flags.verbose });

    const config = await loadCommandConfig(flags.config, out);
    if (!config) {
      return this.exit(1);
    }

    const path = resolve(flags.document);
    let doc: MaterialDocument;
    try {
      doc = await loadMaterialDocument(path);
    } catch (error) {
      out.error(formatErrorChain(error));
      return this.exit(1);
    }
    out.info(`Working document: ${doc.title} (${path})`);

    const codec = createCodec(config);
    const store = new DocumentStore(doc, {
      codec,
      author: config.author,
      repositoryUrl: config.repositoryUrl,
    });
    const log = createPassLog(out);
    const engine = new ReconciliationEngine({
      geometries: defaultGeometryTable(),
      store,
      transactions: store,
      codec,
      log,
    });

    let result: PassResult;
    try {
      result = await runReconciliationPass({
        engine,
        prompt: new ReadlinePrompt(),
        log,
        action: parseMode(flags.mode),
        overwrite: flags.overwrite,
      });
    } catch (error) {
      out.error(formatErrorChain(error));
      await writePassLog(log, flags.log, out);
      return this.exit(1);
    }
    await writePassLog(log, flags.log, out);

    switch (result.status) {
      case "blocked":
        out.header("Pre-Checks Failed");
        for (const line of precheckLines(result.discovery.counters)) {
          if (line.endsWith("NOT OK")) {
            out.item(line);
          } else {
            out.detail(line);
          }
        }
        out.error(`${result.error.message}. No operation is possible on ${doc.title}.`);
        return this.exit(1);

      case "cancelled":
        out.info("Cancelled by user");
        return;

      case "completed":
        if (store.isDirty) {
          try {
            await saveMaterialDocument(path, store.document);
          } catch (error) {
            out.error(formatErrorChain(error));
            return this.exit(1);
          }
          out.info(`Saved ${path}`);
        }
        out.summary(result.summary);
    }
  }
}
