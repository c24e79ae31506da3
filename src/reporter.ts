import path from "node:path";
import chalk, { type ChalkInstance } from "chalk";
import { formatBytes, formatDuration } from "./utils.js";
import type { ConversionJob, JobOutcome, TranscodeSummary, Verbosity } from "./types.js";

export interface OutputSink {
  log(line: string): void;
  error(line: string): void;
}

export interface ReporterOptions {
  verbosity: Verbosity;
  sink?: OutputSink;
  colors?: ChalkInstance;
}

const consoleSink: OutputSink = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function displayName(job: ConversionJob): string {
  return job.relativePath === "" ? path.basename(job.sourcePath) : job.relativePath;
}

function indent(text: string, prefix = "      "): string[] {
  return text.split(/\r?\n/).map((line) => `${prefix}${line}`);
}

export class Reporter {
  private readonly verbosity: Verbosity;
  private readonly sink: OutputSink;
  private readonly c: ChalkInstance;
  private total = 0;
  private done = 0;

  constructor(options: ReporterOptions) {
    this.verbosity = options.verbosity;
    this.sink = options.sink ?? consoleSink;
    this.c = options.colors ?? chalk;
  }

  begin(total: number, inpath: string, outfolder: string): void {
    this.total = total;
    this.done = 0;
    if (this.verbosity === "silent") return;
    this.sink.log(`Found ${total} file${total === 1 ? "" : "s"} in ${inpath}, writing to ${outfolder}`);
  }

  jobStarted(job: ConversionJob, slot: number): void {
    if (this.verbosity !== "verbose") return;
    this.sink.log(this.c.dim(`start ${displayName(job)} -> ${job.outputPath} [slot ${slot + 1}]`));
  }

  jobFinished(outcome: JobOutcome): void {
    this.done++;
    if (this.verbosity === "silent") return;

    const progress = `[${this.done}/${this.total}]`;
    const name = displayName(outcome.job);

    switch (outcome.status) {
      case "succeeded": {
        const count = outcome.warnings.length;
        const note = count > 0 ? this.c.yellow(` (${count} warning${count === 1 ? "" : "s"})`) : "";
        this.sink.log(`${progress} ${this.c.green("done")} ${name}${note}`);
        if (this.verbosity === "verbose") {
          for (const warning of outcome.warnings) {
            this.sink.log(this.c.yellow(`      warning: ${warning}`));
          }
        }
        break;
      }
      case "skipped":
        this.sink.log(`${progress} ${this.c.cyan("skip")} ${name} (${outcome.reason})`);
        break;
      case "failed":
        this.sink.error(`${progress} ${this.c.red("FAIL")} ${name}: ${outcome.error}`);
        if (this.verbosity === "verbose" && outcome.output !== "") {
          for (const line of indent(outcome.output)) this.sink.error(line);
        }
        break;
    }
  }

  nothingFound(message: string): void {
    this.sink.log(message);
  }

  summary(summary: TranscodeSummary): void {
    const warned = summary.withWarnings > 0 ? ` (${summary.withWarnings} with warnings)` : "";

    this.sink.log("");
    this.sink.log(summary.cancelled ? "Transcode cancelled:" : "Transcode completed:");
    this.sink.log(`  Total files: ${summary.totalFiles}`);
    this.sink.log(`  Succeeded:   ${summary.succeeded}${warned}`);
    this.sink.log(`  Skipped:     ${summary.skipped}`);
    this.sink.log(`  Failed:      ${summary.failed.length}`);
    this.sink.log(`  Duration:    ${formatDuration(summary.durationMs)}`);
    this.sink.log(`  Output size: ${formatBytes(summary.outputBytes)}`);

    if (summary.failed.length > 0) {
      this.sink.log("");
      this.sink.log("Failed conversions:");
      for (const f of summary.failed) {
        this.sink.log(`  - ${f.file}: ${f.error}`);
        if (this.verbosity === "verbose" && f.output !== "") {
          for (const line of indent(f.output)) this.sink.log(line);
        }
      }
    }
  }
}
