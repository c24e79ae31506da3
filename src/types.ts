export type SourceFormat = "flac" | "wave";

export type TargetFormat = "opus" | "aac" | "flac" | "wave";

export type Verbosity = "silent" | "normal" | "verbose";

export type ToolName = "flac" | "metaflac" | "opusenc" | "neroAacEnc" | "neroAacTag";

export type ToolPaths = Partial<Record<ToolName, string>>;

export interface PoolConfig {
  maxThreads: number;
  verbosity: Verbosity;
}

export interface TranscodeConfig extends PoolConfig {
  inpath: string;
  outfolder: string;
  quality: number;
  recursive: boolean;
  overwrite: boolean;
  copyImage: boolean;
  sourceFormat: SourceFormat;
  targetFormat: TargetFormat;
  /** Per-invocation limit in milliseconds, 0 for none. */
  timeoutMs: number;
  binDir?: string;
}

export interface DiscoveredFile {
  sourcePath: string;
  /** Path relative to the input folder; empty when the input was a single file. */
  relativePath: string;
}

export type SkipReason = "exists" | "collision" | "cancelled";

export interface ConversionJob {
  readonly id: number;
  readonly sourcePath: string;
  readonly relativePath: string;
  readonly outputPath: string;
  readonly sourceFormat: SourceFormat;
  readonly targetFormat: TargetFormat;
  readonly quality: number;
  readonly copyImage: boolean;
  readonly overwrite: boolean;
  /** Set at construction when the job must not run. */
  readonly skip?: SkipReason;
}

interface OutcomeBase {
  job: ConversionJob;
  durationMs: number;
}

export interface SucceededOutcome extends OutcomeBase {
  status: "succeeded";
  exitCode: 0;
  outputBytes: number;
  warnings: string[];
}

export interface SkippedOutcome extends OutcomeBase {
  status: "skipped";
  reason: SkipReason;
}

export interface FailedOutcome extends OutcomeBase {
  status: "failed";
  error: string;
  exitCode: number | null;
  output: string;
}

export type JobOutcome = SucceededOutcome | SkippedOutcome | FailedOutcome;

export type JobStatus = JobOutcome["status"];

export interface FailedFile {
  file: string;
  error: string;
  exitCode: number | null;
  output: string;
}

export interface TranscodeSummary {
  totalFiles: number;
  succeeded: number;
  withWarnings: number;
  skipped: number;
  failed: FailedFile[];
  outputBytes: number;
  durationMs: number;
  cancelled: boolean;
  exitCode: number;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

export interface ParsedArgs {
  inpath?: string;
  outfolder: string;
  quality: number;
  recursive: boolean;
  forceOverwrite: boolean;
  copyImage: boolean;
  sourceFormat: string;
  targetFormat: string;
  maxThreads: number;
  silent: boolean;
  verbose: boolean;
  timeout: number;
  binDir?: string;
  help: boolean;
  version: boolean;
}
