import { PreconditionFailure } from "../errors.js";
import type { PassLog } from "../pass-log.js";
import type { InteractionPrompt, ModeChoice } from "../prompt.js";
import type { OutcomeCounters } from "./counters.js";
import type { Discovery, ReconcileAction, ReconcileChoice, ReconciliationEngine } from "./engine.js";
import { describeCreate, describeDelete, summarizeReconciliation, type PassSummary } from "./summary.js";

export type PassResult =
  | { status: "blocked"; error: PreconditionFailure; discovery: Discovery }
  | { status: "cancelled"; discovery: Discovery }
  | {
      status: "completed";
      discovery: Discovery;
      choice: ReconcileChoice;
      counters: OutcomeCounters;
      summary: PassSummary;
    };

export interface PassOptions {
  engine: ReconciliationEngine;
  prompt: InteractionPrompt;
  log: PassLog;
  /** Skips the mode prompt when set */
  action?: ReconcileAction;
  overwrite?: boolean;
}

export const PASS_NAME = "Thread Materials";

/**
 * One reconciliation pass: discover, gate, select mode, execute, report.
 */
export async function runReconciliationPass(options: PassOptions): Promise<PassResult> {
  const { engine, prompt, log } = options;
  log.begin(PASS_NAME);
  try {
    const discovery = engine.discover();
    try {
      engine.gate(discovery);
    } catch (error) {
      if (error instanceof PreconditionFailure) {
        log.line(error.message);
        return { status: "blocked", error, discovery };
      }
      throw error;
    }

    log.line();
    log.line("Mode selection...");
    const mode = await selectMode(options, discovery);
    if (mode.action === "cancel") {
      log.line("- Cancelled by user");
      return { status: "cancelled", discovery };
    }
    log.line(
      `- ${mode.action === "create" ? "Create" : "Delete"} thread materials operation selected` +
        (mode.action === "create" && mode.overwrite ? " (overwrite existing)" : "")
    );

    const counters = engine.execute(discovery, mode);
    const summary = summarizeReconciliation(mode.action, counters);
    log.line();
    log.line("Wrap up");
    log.line(`- ${summary.headline}`);
    for (const detail of summary.details) {
      log.line(`  * ${detail}`);
    }
    return { status: "completed", discovery, choice: mode, counters, summary };
  } finally {
    log.end();
  }
}

async function selectMode(options: PassOptions, discovery: Discovery): Promise<ModeChoice> {
  if (options.action) {
    return { action: options.action, overwrite: options.overwrite ?? false };
  }
  const { counters } = discovery;
  const choice = await options.prompt.choose({
    createDescription: describeCreate(counters),
    deleteDescription: counters.existing > 0 ? describeDelete(counters) : undefined,
    existing: counters.existing,
  });
  if (choice.action === "create" && options.overwrite) {
    return { action: "create", overwrite: true };
  }
  return choice;
}
