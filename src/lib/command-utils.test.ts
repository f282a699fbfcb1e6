import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createCodec, createPassLog, loadCommandConfig, writePassLog } from "./command-utils.js";
import { defaultConfig } from "./config.js";
import { Output } from "./output.js";
import { IOFailure } from "./errors.js";
import type { TextFileSink } from "./file-sink.js";

describe("command utilities", () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("builds a codec from the configured prefix", () => {
    const codec = createCodec({ ...defaultConfig(), namePrefix: "Fastener" });
    expect(codec.encode("Brass", 8)).toBe("Fastener - Brass - M8 thread");
  });

  it("reports a missing configuration file instead of throwing", async () => {
    const out = new Output({ verbose: false });
    expect(await loadCommandConfig("/nonexistent/isobolt.config.yaml", out)).toBeNull();
    expect(consoleSpy.mock.calls.flat().join(" ")).toContain("Cannot read configuration file");
  });

  it("echoes the pass log in verbose mode", () => {
    const log = createPassLog(new Output({ verbose: true }));
    log.line("Pre-Checks");
    expect(consoleSpy.mock.calls.flat().join(" ")).toContain("Pre-Checks");
  });

  describe("writePassLog", () => {
    const out = new Output({ verbose: false });

    it("writes nothing without a path", async () => {
      const sink: TextFileSink = { write: vi.fn(async () => "created" as const) };
      await writePassLog(createPassLog(out), undefined, out, sink);
      expect(sink.write).not.toHaveBeenCalled();
    });

    it("writes the log text, overwriting an earlier log", async () => {
      const write = vi.fn(async () => "overwritten" as const);
      const log = createPassLog(out);
      log.line("hello");
      await writePassLog(log, "/tmp/isobolt.log", out, { write });
      expect(write).toHaveBeenCalledWith("/tmp/isobolt.log", "hello\n", true);
    });

    it("warns when the log cannot be written", async () => {
      const write = vi.fn(async (path: string): Promise<"created"> => {
        throw new IOFailure(path);
      });
      await writePassLog(createPassLog(out), "/tmp/isobolt.log", out, { write });
      expect(consoleSpy.mock.calls.flat().join(" ")).toContain('Cannot write file "/tmp/isobolt.log"');
    });
  });
});
