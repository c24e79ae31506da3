import { ConfigurationError } from "./errors.js";
import type { ParsedArgs } from "./types.js";

const VALUE_OPTIONS: Record<string, keyof ParsedArgs> = {
  "-o": "outfolder",
  "--outfolder": "outfolder",
  "-q": "quality",
  "--encoding_quality": "quality",
  "-s": "sourceFormat",
  "--source_format": "sourceFormat",
  "-t": "targetFormat",
  "--target_format": "targetFormat",
  "--max_threads": "maxThreads",
  "--timeout": "timeout",
  "--bin_dir": "binDir",
};

const FLAG_OPTIONS: Record<string, keyof ParsedArgs> = {
  "-r": "recursive",
  "--recursive": "recursive",
  "-f": "forceOverwrite",
  "--force_overwrite": "forceOverwrite",
  "-i": "copyImage",
  "--copy_image": "copyImage",
  "--silent": "silent",
  "--verbose": "verbose",
};

export function defaultArgs(): ParsedArgs {
  return {
    outfolder: "~",
    quality: 50,
    recursive: false,
    forceOverwrite: false,
    copyImage: false,
    sourceFormat: "flac",
    targetFormat: "opus",
    maxThreads: 4,
    silent: false,
    verbose: false,
    timeout: 0,
    help: false,
    version: false,
  };
}

function parseInteger(option: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`invalid value for ${option}: ${raw}`);
  }
  return parseInt(raw, 10);
}

function parseSeconds(option: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigurationError(`invalid value for ${option}: ${raw}`);
  }
  return value;
}

function assignValue(result: ParsedArgs, key: keyof ParsedArgs, option: string, raw: string): void {
  switch (key) {
    case "outfolder":
      result.outfolder = raw;
      break;
    case "quality":
      result.quality = parseInteger(option, raw);
      break;
    case "maxThreads":
      result.maxThreads = parseInteger(option, raw);
      break;
    case "timeout":
      result.timeout = parseSeconds(option, raw);
      break;
    case "sourceFormat":
      result.sourceFormat = raw;
      break;
    case "targetFormat":
      result.targetFormat = raw;
      break;
    case "binDir":
      result.binDir = raw;
      break;
    default:
      throw new ConfigurationError(`unknown option: ${option}`);
  }
}

function assignFlag(result: ParsedArgs, key: keyof ParsedArgs): void {
  switch (key) {
    case "recursive":
      result.recursive = true;
      break;
    case "forceOverwrite":
      result.forceOverwrite = true;
      break;
    case "copyImage":
      result.copyImage = true;
      break;
    case "silent":
      result.silent = true;
      break;
    case "verbose":
      result.verbose = true;
      break;
    default:
      break;
  }
}

/** Parses the argument list after the node binary and script path. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result = defaultArgs();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "--version") {
      result.version = true;
      return result;
    }

    const flag = FLAG_OPTIONS[arg];
    if (flag) {
      assignFlag(result, flag);
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const option = eq > 0 ? arg.slice(0, eq) : arg;
    const valueKey = VALUE_OPTIONS[option];
    if (valueKey) {
      const next = eq > 0 ? arg.slice(eq + 1) : args[++i];
      if (next === undefined) {
        throw new ConfigurationError(`${option} requires an argument`);
      }
      assignValue(result, valueKey, option, next);
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      throw new ConfigurationError(`unknown option: ${arg}`);
    }

    if (result.inpath !== undefined) {
      throw new ConfigurationError(`unexpected argument: ${arg}`);
    }
    result.inpath = arg;
  }

  return result;
}
