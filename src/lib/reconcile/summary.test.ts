import { describe, it, expect } from "vitest";
import { describeCreate, describeDelete, precheckLines, summarizeReconciliation } from "./summary.js";
import { createCounters, type OutcomeCounters } from "./counters.js";

function counters(values: Partial<OutcomeCounters>): OutcomeCounters {
  return { ...createCounters(), ...values };
}

describe("precheckLines", () => {
  it("flags missing geometries and templates", () => {
    expect(precheckLines(counters({ geometries: 1, existing: 0 }))).toEqual([
      "Found 1 thread geometry --> ok",
      "Found no existing thread materials --> ok",
      "Found no valid template materials --> NOT OK",
      "Found no invalid template materials --> ok",
    ]);
  });

  it("marks invalid templates as ignored", () => {
    expect(precheckLines(counters({ invalidTemplates: 2 }))[3]).toBe(
      "Found 2 invalid template materials --> ignore"
    );
  });
});

describe("mode descriptions", () => {
  it("describes what create will do", () => {
    expect(describeCreate(counters({ geometries: 24, validTemplates: 2 }))).toBe(
      "Will create 48 thread materials."
    );
    expect(describeCreate(counters({ geometries: 1, validTemplates: 1, existing: 1 }))).toBe(
      "Will create 1 thread material. 1 existing thread material may be overwritten."
    );
  });

  it("describes what delete will do", () => {
    expect(describeDelete(counters({ existing: 3 }))).toBe(
      "Will delete 3 existing thread materials. Template or other materials will not be deleted!"
    );
  });
});

describe("summarizeReconciliation", () => {
  it("reports nothing to do when every material was skipped", () => {
    expect(summarizeReconciliation("create", counters({ skipped: 4 }))).toEqual({
      title: "Operation Completed",
      headline: "All thread materials were already present. Did not create new materials.",
      details: ["Created no new materials", "Overwrote no materials", "Skipped 4 existing materials"],
      level: "nothing",
    });
  });

  it("counts created and overwritten materials together", () => {
    const summary = summarizeReconciliation("create", counters({ created: 1, overwritten: 2 }));
    expect(summary.headline).toBe("Created 3 thread materials.");
    expect(summary.details).toEqual(["Created 1 new material", "Overwrote 2 materials"]);
    expect(summary.level).toBe("success");
  });

  it("reports failures as a warning", () => {
    const summary = summarizeReconciliation("create", counters({ created: 19, createFailed: 1 }));
    expect(summary.title).toBe("Operation Completed with Errors");
    expect(summary.level).toBe("warning");
    expect(summary.details).toEqual([
      "Created 19 new materials",
      "Overwrote no materials",
      "Failed to create 1 material",
    ]);
  });

  it("summarizes deletion", () => {
    expect(summarizeReconciliation("delete", counters({ deleted: 0 })).headline).toBe(
      "No thread materials were found. Did not delete any materials."
    );
    const summary = summarizeReconciliation("delete", counters({ deleted: 5, deleteFailed: 1 }));
    expect(summary.headline).toBe("Deleted 5 thread materials.");
    expect(summary.details).toEqual(["Deleted 5 materials", "Failed to delete 1 material"]);
  });
});
