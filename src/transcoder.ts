import fs from "node:fs/promises";
import { ResultAggregator } from "./aggregator.js";
import { ExternalEncoderAdapter } from "./encoder.js";
import { EmptyDiscoveryError } from "./errors.js";
import { ProcessExecutor } from "./executor.js";
import { requiredTools } from "./formats.js";
import { buildJobs, jobOptionsFrom } from "./jobs.js";
import { WorkerPool } from "./pool.js";
import { Reporter } from "./reporter.js";
import { resolveSources } from "./resolver.js";
import { locateTools } from "./tools.js";
import { errorMessage } from "./utils.js";
import type { CommandExecutor } from "./executor.js";
import type { TaskSettlement } from "./pool.js";
import type { ConversionJob, DiscoveredFile, JobOutcome, ToolPaths, TranscodeConfig, TranscodeSummary } from "./types.js";

export interface TranscoderDeps {
  executor?: CommandExecutor;
  /** Pre-located tools; when omitted they are looked up in binDir and PATH. */
  tools?: ToolPaths;
  reporter?: Reporter;
  signal?: AbortSignal;
}

export interface TranscodeReport {
  summary: TranscodeSummary;
  /** One outcome per discovered file, in discovery order. */
  outcomes: JobOutcome[];
}

function outcomeOf(settlement: TaskSettlement<ConversionJob, JobOutcome>): JobOutcome {
  switch (settlement.state) {
    case "fulfilled":
      return settlement.value;
    case "rejected":
      return {
        status: "failed",
        job: settlement.item,
        error: errorMessage(settlement.reason),
        exitCode: null,
        output: "",
        durationMs: 0,
      };
    case "cancelled":
      return { status: "skipped", job: settlement.item, reason: "cancelled", durationMs: 0 };
  }
}

export class Transcoder {
  readonly config: Readonly<TranscodeConfig>;
  private readonly executor: CommandExecutor;
  private readonly reporter: Reporter;
  private readonly presetTools?: ToolPaths;
  private readonly signal?: AbortSignal;

  constructor(config: Readonly<TranscodeConfig>, deps: TranscoderDeps = {}) {
    this.config = config;
    this.executor = deps.executor ?? new ProcessExecutor();
    this.reporter = deps.reporter ?? new Reporter({ verbosity: config.verbosity });
    this.presetTools = deps.tools;
    this.signal = deps.signal;
  }

  async run(): Promise<TranscodeReport> {
    const { config } = this;

    const tools = this.presetTools
      ?? (await locateTools(requiredTools(config.sourceFormat, config.targetFormat), config.binDir));

    let files: DiscoveredFile[];
    try {
      files = await resolveSources(config.inpath, config.recursive, config.sourceFormat);
    } catch (err) {
      if (!(err instanceof EmptyDiscoveryError)) throw err;
      this.reporter.nothingFound(err.message);
      const empty = new ResultAggregator(0);
      const summary = empty.summarize();
      this.reporter.summary(summary);
      return { summary, outcomes: [] };
    }

    await fs.mkdir(config.outfolder, { recursive: true });
    const jobs = await buildJobs(files, jobOptionsFrom(config));

    const adapter = new ExternalEncoderAdapter(this.executor, tools, { timeoutMs: config.timeoutMs });
    const pool = new WorkerPool(config.maxThreads);
    const aggregator = new ResultAggregator(jobs.length);

    this.reporter.begin(jobs.length, config.inpath, config.outfolder);

    const settlements = await pool.run(jobs, (job, context) => adapter.execute(job, context.signal), {
      signal: this.signal,
      onStart: (job, context) => this.reporter.jobStarted(job, context.slot),
      onSettled: (settlement) => {
        const outcome = outcomeOf(settlement);
        aggregator.record(outcome);
        this.reporter.jobFinished(outcome);
      },
    });

    for (const settlement of settlements) {
      if (settlement.state === "cancelled") {
        aggregator.record(outcomeOf(settlement));
      }
    }

    if (this.signal?.aborted) {
      aggregator.markCancelled();
    }

    const summary = aggregator.summarize();
    this.reporter.summary(summary);
    return { summary, outcomes: aggregator.list() };
  }
}
