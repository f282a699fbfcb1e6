import { formatTimestamp } from "./formatting.js";

export type PassLogSink = (line: string) => void;

const SEPARATOR = "-".repeat(79);

/**
 * Line-oriented diagnostic log of one pass, fanned out to any attached sinks.
 * The collected text can be written to a log file once the pass is over.
 */
export class PassLog {
  private readonly sinks = new Set<PassLogSink>();
  private readonly buffer: string[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  addSink(sink: PassLogSink): void {
    this.sinks.add(sink);
  }

  removeSink(sink: PassLogSink): void {
    this.sinks.delete(sink);
  }

  begin(name: string): void {
    this.line(SEPARATOR);
    this.line(`Pass of ${name}, timestamp ${formatTimestamp(this.now())}`);
  }

  line(text: string = ""): void {
    for (const part of text.split("\n")) {
      this.buffer.push(part);
      for (const sink of this.sinks) {
        sink(part);
      }
    }
  }

  end(): void {
    this.line();
    this.line("Pass complete");
  }

  get lines(): readonly string[] {
    return this.buffer;
  }

  text(): string {
    return this.buffer.map((l) => l + "\n").join("");
  }
}
