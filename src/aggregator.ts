import type { FailedFile, JobOutcome, TranscodeSummary } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CANCELLED = 130;

/**
 * Collects one outcome per job, in whatever order slots finish them.
 * `record` is synchronous, so calls from concurrent slots never interleave.
 */
export class ResultAggregator {
  private readonly seen = new Set<number>();
  private readonly outcomes: JobOutcome[] = [];
  private succeeded = 0;
  private withWarnings = 0;
  private skipped = 0;
  private outputBytes = 0;
  private failed: FailedFile[] = [];
  private cancelled = false;
  private readonly startTime: number;
  private readonly now: () => number;

  constructor(
    readonly expected: number,
    now: () => number = Date.now,
  ) {
    this.now = now;
    this.startTime = now();
  }

  record(outcome: JobOutcome): void {
    if (this.seen.has(outcome.job.id)) {
      throw new Error(`Outcome for job ${outcome.job.id} recorded twice`);
    }
    this.seen.add(outcome.job.id);
    this.outcomes.push(outcome);

    switch (outcome.status) {
      case "succeeded":
        this.succeeded++;
        this.outputBytes += outcome.outputBytes;
        if (outcome.warnings.length > 0) this.withWarnings++;
        break;
      case "skipped":
        this.skipped++;
        if (outcome.reason === "cancelled") this.cancelled = true;
        break;
      case "failed":
        this.failed.push({
          file: outcome.job.sourcePath,
          error: outcome.error,
          exitCode: outcome.exitCode,
          output: outcome.output,
        });
        break;
    }
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  get recorded(): number {
    return this.outcomes.length;
  }

  /** Outcomes ordered by job id, i.e. discovery order. */
  list(): JobOutcome[] {
    return [...this.outcomes].sort((a, b) => a.job.id - b.job.id);
  }

  summarize(): TranscodeSummary {
    if (this.outcomes.length !== this.expected) {
      throw new Error(`Expected ${this.expected} outcomes, got ${this.outcomes.length}`);
    }

    const failed = [...this.failed].sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));

    let exitCode = EXIT_OK;
    if (this.cancelled) exitCode = EXIT_CANCELLED;
    else if (failed.length > 0) exitCode = EXIT_FAILED;

    return {
      totalFiles: this.expected,
      succeeded: this.succeeded,
      withWarnings: this.withWarnings,
      skipped: this.skipped,
      failed,
      outputBytes: this.outputBytes,
      durationMs: this.now() - this.startTime,
      cancelled: this.cancelled,
      exitCode,
    };
  }
}
