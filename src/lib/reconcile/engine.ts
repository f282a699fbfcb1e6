import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import { describeBoltGeometry } from "../geometry/bolt-geometry.js";
import type { GeometryTable } from "../geometry/registry.js";
import type { NameCodec } from "../naming/name-codec.js";
import { TemplateValidator } from "../validation/template-validator.js";
import type { ArtifactStore, MaterialRecord, TransactionScope } from "../store/types.js";
import type { PassLog } from "../pass-log.js";
import { PreconditionFailure, ValidationFailure, formatErrorChain } from "../errors.js";
import { createCounters, resetExecutionCounters, type OutcomeCounters } from "./counters.js";
import { precheckLines } from "./summary.js";

export type ReconcileAction = "create" | "delete";

export interface ReconcileChoice {
  action: ReconcileAction;
  /** Replace existing thread materials when creating */
  overwrite: boolean;
}

export interface ValidTemplate {
  material: MaterialRecord;
  category: string;
}

export interface InvalidTemplate {
  material: MaterialRecord;
  reason: string;
  error: ValidationFailure;
}

export interface Discovery {
  geometries: readonly BoltGeometry[];
  existing: MaterialRecord[];
  templates: ValidTemplate[];
  invalid: InvalidTemplate[];
  counters: OutcomeCounters;
}

export interface ReconciliationEngineOptions {
  geometries: GeometryTable;
  store: ArtifactStore;
  transactions: TransactionScope;
  codec: NameCodec;
  log: PassLog;
  validator?: TemplateValidator;
}

export function transactionName(action: ReconcileAction): string {
  return `${action === "create" ? "Create" : "Delete"} Thread Materials`;
}

function indent(text: string, prefix: string = "    "): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

/**
 * Reconciles derived thread materials against templates × bolt geometries.
 *
 * discover() reads the store, execute() mutates it inside one transaction.
 * Per-material failures are logged and counted; they never abort the batch.
 */
export class ReconciliationEngine {
  private readonly validator: TemplateValidator;

  constructor(private readonly options: ReconciliationEngineOptions) {
    this.validator = options.validator ?? new TemplateValidator(options.codec);
  }

  discover(): Discovery {
    const { log, store, codec } = this.options;
    const counters = createCounters();

    log.line("Pre-Checks");

    log.line("- Searching thread geometries");
    const geometries = this.options.geometries.getBoltGeometries();
    for (const g of geometries) {
      log.line(`   - ${describeBoltGeometry(g)}`);
    }
    counters.geometries = geometries.length;

    log.line("- Searching existing thread materials");
    const existing = store.find(codec.artifactPattern).filter((m) => codec.isArtifactName(m.name));
    for (const m of existing) {
      log.line(`   - Material "${m.name}"`);
    }
    counters.existing = existing.length;

    log.line("- Searching and checking thread template materials");
    const templates: ValidTemplate[] = [];
    const invalid: InvalidTemplate[] = [];
    for (const material of store.find(codec.templatePattern)) {
      const result = this.validator.validate(material);
      for (const line of result.trace) {
        log.line(`  ${line}`);
      }
      if (result.ok) {
        templates.push({ material, category: result.category });
      } else {
        const error = new ValidationFailure(result.reason);
        this.logFailure(`Check failed on template material "${material.name}"`, error);
        invalid.push({ material, reason: result.reason, error });
      }
    }
    counters.validTemplates = templates.length;
    counters.invalidTemplates = invalid.length;

    log.line(this.isReady(counters) ? "- PRE-CHECK OK" : "- PRE-CHECK FAILED");
    for (const line of precheckLines(counters)) {
      log.line(`  - ${line}`);
    }

    return { geometries, existing, templates, invalid, counters };
  }

  /**
   * Throws PreconditionFailure when there is nothing to generate from.
   */
  gate(discovery: Discovery): void {
    const problems: string[] = [];
    if (discovery.counters.geometries === 0) {
      problems.push("no thread geometries");
    }
    if (discovery.counters.validTemplates === 0) {
      problems.push("no valid template materials");
    }
    if (problems.length > 0) {
      throw new PreconditionFailure(`Pre-checks failed: ${problems.join(", ")}`);
    }
  }

  execute(discovery: Discovery, choice: ReconcileChoice): OutcomeCounters {
    this.gate(discovery);
    const { log, transactions } = this.options;
    const counters = discovery.counters;
    resetExecutionCounters(counters);

    const name = transactionName(choice.action);
    log.line();
    log.line(`Starting transaction "${name}"`);
    transactions.run(name, () => {
      if (choice.action === "create") {
        this.createAll(discovery, choice.overwrite, counters);
      } else {
        this.deleteAll(discovery, counters);
      }
    });
    log.line(`Transaction "${name}" committed`);

    return counters;
  }

  private createAll(discovery: Discovery, overwrite: boolean, counters: OutcomeCounters): void {
    const { log, store, codec } = this.options;
    log.line();
    log.line("Creating thread materials");

    for (const template of discovery.templates) {
      for (const geometry of discovery.geometries) {
        let name: string;
        try {
          name = codec.encode(template.category, geometry.D);
        } catch (error) {
          this.logFailure(
            `Failed to name M${geometry.D} thread material of "${template.material.name}"`,
            error
          );
          counters.createFailed++;
          continue;
        }
        const existing = store.find(name);

        if (existing.length > 0 && !overwrite) {
          log.line(`  Skipped existing "${name}"`);
          counters.skipped++;
          continue;
        }

        if (existing.length > 0) {
          try {
            for (const m of existing) {
              store.delete(m);
            }
          } catch (error) {
            this.logFailure(`Failed to remove "${name}"`, error);
            counters.overwriteFailed++;
            continue;
          }
        }

        log.line(
          `  Creating M${geometry.D} thread material from template "${template.material.name}"`
        );
        try {
          store.create(template.material, name, geometry);
        } catch (error) {
          this.logFailure(`Failed to create "${name}"`, error);
          if (existing.length > 0) {
            counters.overwriteFailed++;
          } else {
            counters.createFailed++;
          }
          continue;
        }

        if (existing.length > 0) {
          counters.overwritten++;
        } else {
          counters.created++;
        }
      }
    }
  }

  private deleteAll(discovery: Discovery, counters: OutcomeCounters): void {
    const { log, store } = this.options;
    log.line();
    log.line("Deleting thread materials");

    for (const material of discovery.existing) {
      try {
        store.delete(material);
        log.line(`  Deleted "${material.name}"`);
        counters.deleted++;
      } catch (error) {
        this.logFailure(`Failed to delete "${material.name}"`, error);
        counters.deleteFailed++;
      }
    }
  }

  private logFailure(message: string, error: unknown): void {
    this.options.log.line(`  ${message}`);
    this.options.log.line(indent(formatErrorChain(error)));
  }

  private isReady(counters: OutcomeCounters): boolean {
    return counters.geometries > 0 && counters.validTemplates > 0;
  }
}
