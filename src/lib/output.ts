import chalk from "chalk";
import type { PassSummary } from "./reconcile/summary.js";
import type { PassLogSink } from "./pass-log.js";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  // Progress messages (verbose only)
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header
  header(title: string): void {
    console.log(chalk.cyan(title));
  }

  // List item (with failure marker)
  item(msg: string): void {
    console.log(chalk.red("  ✗") + " " + msg);
  }

  // Plain detail line
  detail(msg: string): void {
    console.log(chalk.dim("  * ") + msg);
  }

  /**
   * Pass log sink echoing log lines in verbose mode.
   */
  logSink(): PassLogSink {
    return (line) => {
      if (this.verbose) {
        console.log(chalk.dim(line));
      }
    };
  }

  // Final summary of a pass
  summary(summary: PassSummary): void {
    console.log();
    this.header(summary.title);
    switch (summary.level) {
      case "warning":
        this.warn(summary.headline);
        break;
      case "nothing":
        console.log(chalk.blue("●") + " " + summary.headline);
        break;
      default:
        this.success(summary.headline);
    }
    for (const detail of summary.details) {
      this.detail(detail);
    }
  }
}
