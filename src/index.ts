#!/usr/bin/env node

import { createRequire } from "node:module";
import { parseArgs } from "./args.js";
import { buildConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { Transcoder } from "./transcoder.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
tunemirror v${VERSION}: transcode FLAC/WAVE to Opus/AAC/FLAC/WAVE, mirroring the folder structure

Usage:
  tunemirror <inpath> [options]

Options:
  -o, --outfolder <dir>          Target folder for the transcoded files (default: ~)
  -q, --encoding_quality <n>     Encoder quality 0-100 (default: 50)
  -r, --recursive                Convert files from subfolders
  -f, --force_overwrite          Overwrite existing files
  -i, --copy_image               Copy the embedded cover image (FLAC source, non-WAVE target)
  -s, --source_format <fmt>      flac | wave (default: flac)
  -t, --target_format <fmt>      opus | aac | flac | wave (default: opus)
      --max_threads <n>          Concurrent encoder processes 1-64 (default: 4)
      --timeout <seconds>        Kill an encoder that runs longer than this (default: 0, no limit)
      --bin_dir <dir>            Look for encoder executables here before PATH
      --silent                   Only print the final summary
      --verbose                  Print per-file detail and tool diagnostics
  -h, --help                     Show this help message
      --version                  Show version number

External tools: flac, metaflac, opusenc, neroAacEnc, neroAacTag
`.trim();

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  const config = buildConfig(parsed);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error("\nInterrupted: finishing up, press Ctrl+C again to quit immediately");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const { summary } = await new Transcoder(config, { signal: controller.signal }).run();
    process.exitCode = summary.exitCode;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  if (err instanceof ConfigurationError) {
    console.error("Run tunemirror --help for usage");
  }
  process.exit(1);
});
