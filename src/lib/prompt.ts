import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import type { ScheduleKindType } from "./constants.js";
import type { ReconcileAction } from "./reconcile/engine.js";

export interface ModeRequest {
  createDescription: string;
  /** Omitted when there is nothing to delete */
  deleteDescription?: string;
  /** Number of existing thread materials that could be overwritten */
  existing: number;
}

export type ModeChoice = { action: ReconcileAction; overwrite: boolean } | { action: "cancel" };

export interface ScheduleOption {
  kind: ScheduleKindType;
  label: string;
  description: string;
}

export interface ScheduleRequest {
  options: ScheduleOption[];
  /** Number of target files that already exist */
  existing: number;
}

export type ScheduleChoice =
  | { schedule: ScheduleKindType; overwrite: boolean }
  | { schedule: "cancel" };

export interface InteractionPrompt {
  choose(request: ModeRequest): Promise<ModeChoice>;
  chooseSchedule(request: ScheduleRequest): Promise<ScheduleChoice>;
}

export interface ReadlinePromptOptions {
  input?: Readable;
  output?: Writable;
}

function isYes(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Numbered-menu prompt on a terminal. An empty or unknown answer cancels.
 */
export class ReadlinePrompt implements InteractionPrompt {
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(options: ReadlinePromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async choose(request: ModeRequest): Promise<ModeChoice> {
    const entries: { action: ReconcileAction; text: string }[] = [
      { action: "create", text: `Create thread materials - ${request.createDescription}` },
    ];
    if (request.deleteDescription) {
      entries.push({ action: "delete", text: `Delete thread materials - ${request.deleteDescription}` });
    }

    return this.session(async (ask) => {
      const picked = await this.menu(ask, entries.map((e) => e.text));
      const entry = picked === undefined ? undefined : entries[picked];
      if (!entry) {
        return { action: "cancel" };
      }
      let overwrite = false;
      if (entry.action === "create" && request.existing > 0) {
        overwrite = isYes(await ask("Overwrite existing thread materials? [y/N] "));
      }
      return { action: entry.action, overwrite };
    });
  }

  async chooseSchedule(request: ScheduleRequest): Promise<ScheduleChoice> {
    return this.session(async (ask) => {
      const picked = await this.menu(
        ask,
        request.options.map((o) => `${o.label} - ${o.description}`)
      );
      const option = picked === undefined ? undefined : request.options[picked];
      if (!option) {
        return { schedule: "cancel" };
      }
      let overwrite = true;
      if (request.existing > 0) {
        overwrite = isYes(await ask("Overwrite existing files? [y/N] "));
      }
      return { schedule: option.kind, overwrite };
    });
  }

  private async menu(ask: (q: string) => Promise<string>, items: string[]): Promise<number | undefined> {
    items.forEach((item, i) => this.output.write(`  ${i + 1}) ${item}\n`));
    this.output.write("  0) Cancel\n");
    const answer = Number((await ask("Select an option: ")).trim());
    if (!Number.isInteger(answer) || answer < 1 || answer > items.length) {
      return undefined;
    }
    return answer - 1;
  }

  private async session<T>(body: (ask: (q: string) => Promise<string>) => Promise<T>): Promise<T> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await body((q) => rl.question(q));
    } finally {
      rl.close();
    }
  }
}
