// src/patching/report.ts
// Incremental PatchReport construction. A built report is frozen, lists and entries included.

import type { EditOutcome, FailedEdit, PatchReport } from "./types";

export class PatchReportBuilder {
  private readonly outcomes: EditOutcome[] = [];
  private swept = 0;

  record(outcome: EditOutcome): void {
    this.outcomes.push(outcome);
  }

  setSwept(count: number): void {
    this.swept = count;
  }

  build(): PatchReport {
    const outcomes = [...this.outcomes].sort((a, b) => a.index - b.index);
    const applied: string[] = [];
    const skippedDuplicate: string[] = [];
    const skippedNoop: string[] = [];
    const failed: FailedEdit[] = [];
    const lowConfidence: string[] = [];

    for (const o of outcomes) {
      switch (o.status) {
        case "applied":
          applied.push(o.location);
          if (o.tier === "fuzzy_mid" || o.tier === "fuzzy_low") {
            lowConfidence.push(o.location);
          }
          break;
        case "skipped_duplicate":
        case "skipped_subsumed":
          skippedDuplicate.push(o.location);
          break;
        case "skipped_noop":
          skippedNoop.push(o.location);
          break;
        case "failed":
          failed.push(Object.freeze({ location: o.location, reason: o.reason ?? "unknown" }));
          break;
      }
    }

    return Object.freeze({
      applied: Object.freeze(applied),
      skippedDuplicate: Object.freeze(skippedDuplicate),
      skippedNoop: Object.freeze(skippedNoop),
      failed: Object.freeze(failed),
      lowConfidence: Object.freeze(lowConfidence),
      outcomes: Object.freeze(outcomes.map((o) => Object.freeze({ ...o }))),
      sweptParagraphs: this.swept,
    });
  }
}
