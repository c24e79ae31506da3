import path from "node:path";
import { TARGET_EXTENSIONS } from "./formats.js";
import { pathExists, replaceExtension } from "./utils.js";
import type { ConversionJob, DiscoveredFile, SkipReason, SourceFormat, TargetFormat, TranscodeConfig } from "./types.js";

export interface JobOptions {
  outfolder: string;
  sourceFormat: SourceFormat;
  targetFormat: TargetFormat;
  quality: number;
  copyImage: boolean;
  overwrite: boolean;
}

export function outputPathFor(file: DiscoveredFile, outfolder: string, targetFormat: TargetFormat): string {
  const relative = file.relativePath === "" ? path.basename(file.sourcePath) : file.relativePath;
  return path.join(outfolder, replaceExtension(relative, TARGET_EXTENSIONS[targetFormat]));
}

/**
 * Builds one immutable job. Whether an existing output blocks the job is
 * decided here, so no worker ever discovers it halfway through a transcode.
 */
export async function buildJob(id: number, file: DiscoveredFile, options: JobOptions): Promise<ConversionJob> {
  const outputPath = outputPathFor(file, options.outfolder, options.targetFormat);

  let skip: SkipReason | undefined;
  if (!options.overwrite && (await pathExists(outputPath))) {
    skip = "exists";
  }

  return Object.freeze({
    id,
    sourcePath: file.sourcePath,
    relativePath: file.relativePath,
    outputPath,
    sourceFormat: options.sourceFormat,
    targetFormat: options.targetFormat,
    quality: options.quality,
    copyImage: options.copyImage,
    overwrite: options.overwrite,
    skip,
  });
}

/**
 * Builds jobs in discovery order. A job whose output path was already
 * claimed by an earlier job is skipped as a collision.
 */
export async function buildJobs(files: readonly DiscoveredFile[], options: JobOptions): Promise<ConversionJob[]> {
  const claimed = new Set<string>();
  const jobs: ConversionJob[] = [];

  for (const [index, file] of files.entries()) {
    const job = await buildJob(index + 1, file, options);
    const key = process.platform === "win32" || process.platform === "darwin"
      ? job.outputPath.toLowerCase()
      : job.outputPath;

    if (claimed.has(key)) {
      jobs.push(Object.freeze({ ...job, skip: "collision" as const }));
      continue;
    }

    claimed.add(key);
    jobs.push(job);
  }

  return jobs;
}

export function jobOptionsFrom(config: Readonly<TranscodeConfig>): JobOptions {
  return {
    outfolder: config.outfolder,
    sourceFormat: config.sourceFormat,
    targetFormat: config.targetFormat,
    quality: config.quality,
    copyImage: config.copyImage,
    overwrite: config.overwrite,
  };
}
