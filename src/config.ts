import path from "node:path";
import { ConfigurationError } from "./errors.js";
import { SOURCE_FORMATS, TARGET_FORMATS, isSourceFormat, isTargetFormat, supportsCoverArt } from "./formats.js";
import { expandHome } from "./utils.js";
import type { ParsedArgs, TranscodeConfig, Verbosity } from "./types.js";

export const MIN_THREADS = 1;
export const MAX_THREADS = 64;

function checkIntegerRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

/**
 * Turns parsed CLI arguments into the frozen configuration shared by the
 * scheduler and every worker. Throws ConfigurationError on any invalid value.
 */
export function buildConfig(args: ParsedArgs): Readonly<TranscodeConfig> {
  if (args.inpath === undefined || args.inpath === "") {
    throw new ConfigurationError("no input file or folder specified");
  }

  checkIntegerRange("encoding_quality", args.quality, 0, 100);
  checkIntegerRange("max_threads", args.maxThreads, MIN_THREADS, MAX_THREADS);

  const sourceFormat = args.sourceFormat;
  if (!isSourceFormat(sourceFormat)) {
    throw new ConfigurationError(
      `unsupported source format: ${sourceFormat} (choose from ${SOURCE_FORMATS.join(", ")})`,
    );
  }

  const targetFormat = args.targetFormat;
  if (!isTargetFormat(targetFormat)) {
    throw new ConfigurationError(
      `unsupported target format: ${targetFormat} (choose from ${TARGET_FORMATS.join(", ")})`,
    );
  }

  if (args.copyImage && sourceFormat === "wave") {
    throw new ConfigurationError("WAVE files have no embedded images to copy");
  }

  if (args.copyImage && !supportsCoverArt(targetFormat)) {
    throw new ConfigurationError("WAVE files cannot carry an embedded image");
  }

  if (args.silent && args.verbose) {
    throw new ConfigurationError("--silent and --verbose cannot be combined");
  }

  if (!Number.isFinite(args.timeout) || args.timeout < 0) {
    throw new ConfigurationError(`timeout must be a non-negative number of seconds, got ${args.timeout}`);
  }

  const verbosity: Verbosity = args.silent ? "silent" : args.verbose ? "verbose" : "normal";

  return Object.freeze({
    inpath: path.resolve(expandHome(args.inpath)),
    outfolder: path.resolve(expandHome(args.outfolder)),
    quality: args.quality,
    recursive: args.recursive,
    overwrite: args.forceOverwrite,
    copyImage: args.copyImage,
    sourceFormat,
    targetFormat,
    maxThreads: args.maxThreads,
    verbosity,
    timeoutMs: Math.round(args.timeout * 1000),
    binDir: args.binDir === undefined ? undefined : path.resolve(expandHome(args.binDir)),
  });
}
