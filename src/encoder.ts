import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import os from "node:os";
import { prepareCover } from "./artwork.js";
import { TARGET_EXTENSIONS, aacQuality, flacCompressionLevel, opusComplexity, supportsCoverArt } from "./formats.js";
import { parseVorbisComments, toNeroTags } from "./tags.js";
import { errorMessage, tail } from "./utils.js";
import type { CommandExecutor, ExecuteOptions } from "./executor.js";
import type { VorbisTag } from "./tags.js";
import type { CommandResult, ConversionJob, JobOutcome, ToolName, ToolPaths } from "./types.js";

export interface EncoderOptions {
  /** Per-invocation limit in milliseconds, 0 for none. */
  timeoutMs: number;
}

class StepFailure extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly output: string,
  ) {
    super(message);
    this.name = "StepFailure";
  }
}

/** A tool was stopped because the run was aborted. */
class StepCancelled extends StepFailure {
  constructor(output: string) {
    super("cancelled", null, output);
    this.name = "StepCancelled";
  }
}

async function readMarker(filePath: string, offset: number, length: number): Promise<string> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, offset);
    return buffer.subarray(0, bytesRead).toString("latin1");
  } finally {
    await handle.close();
  }
}

/** Quick sanity check of the stream header before any tool runs. */
export async function checkStreamMarker(job: ConversionJob): Promise<void> {
  if (job.sourceFormat === "flac") {
    if ((await readMarker(job.sourcePath, 0, 4)) !== "fLaC") {
      throw new StepFailure("Not a valid FLAC file", null, "");
    }
    return;
  }

  const riff = await readMarker(job.sourcePath, 0, 4);
  const wave = await readMarker(job.sourcePath, 8, 4);
  if (riff !== "RIFF" || wave !== "WAVE") {
    throw new StepFailure("Not a valid WAVE file", null, "");
  }
}

/**
 * Runs one job through the external tools for its format pair.
 *
 * Output is written to a hidden temp file beside the destination and renamed
 * into place only once every primary step succeeded. Cover art is secondary:
 * if it can't be extracted or embedded the job still succeeds, with a warning.
 * A tool killed by an abort turns the job into a `cancelled` skip.
 */
export class ExternalEncoderAdapter {
  private readonly options: EncoderOptions;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly tools: ToolPaths,
    options: Partial<EncoderOptions> = {},
  ) {
    this.options = { timeoutMs: options.timeoutMs ?? 0 };
  }

  async execute(job: ConversionJob, signal?: AbortSignal): Promise<JobOutcome> {
    const start = Date.now();

    if (job.skip) {
      return { status: "skipped", job, reason: job.skip, durationMs: 0 };
    }

    const warnings: string[] = [];
    const extension = TARGET_EXTENSIONS[job.targetFormat];
    const tempOutput = path.join(
      path.dirname(job.outputPath),
      `.tunemirror-${crypto.randomBytes(8).toString("hex")}${extension}`,
    );
    let workDir: string | undefined;

    try {
      await checkStreamMarker(job);
      await fs.mkdir(path.dirname(job.outputPath), { recursive: true });
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), "tunemirror-"));

      await this.transcode(job, tempOutput, workDir, warnings, signal);

      const tempStats = await fs.stat(tempOutput);
      if (tempStats.size === 0) {
        throw new StepFailure("Generated file is empty", 0, "");
      }

      try {
        const outputLstat = await fs.lstat(job.outputPath);
        if (outputLstat.isSymbolicLink()) {
          throw new StepFailure("Output path is a symbolic link, refusing to overwrite", null, "");
        }
      } catch (e) {
        if (e instanceof StepFailure) throw e;
        if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
      }

      await fs.rename(tempOutput, job.outputPath);

      return {
        status: "succeeded",
        job,
        exitCode: 0,
        outputBytes: tempStats.size,
        warnings,
        durationMs: Date.now() - start,
      };
    } catch (err) {
      let error = errorMessage(err);
      try {
        await fs.rm(tempOutput, { force: true });
      } catch (cleanupErr) {
        error += ` (could not remove ${tempOutput}: ${errorMessage(cleanupErr)})`;
      }

      if (err instanceof StepCancelled) {
        return { status: "skipped", job, reason: "cancelled", durationMs: Date.now() - start };
      }

      return {
        status: "failed",
        job,
        error,
        exitCode: err instanceof StepFailure ? err.exitCode : null,
        output: err instanceof StepFailure ? err.output : "",
        durationMs: Date.now() - start,
      };
    } finally {
      if (workDir) {
        await fs.rm(workDir, { recursive: true, force: true });
      }
    }
  }

  private async transcode(
    job: ConversionJob,
    tempOutput: string,
    workDir: string,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    if (job.sourceFormat === "wave" && job.targetFormat === "wave") {
      await fs.copyFile(job.sourcePath, tempOutput);
      return;
    }

    if (job.sourceFormat === "flac" && job.targetFormat === "wave") {
      await this.decodeFlac(job.sourcePath, tempOutput, signal);
      return;
    }

    let audioInput = job.sourcePath;
    let tags: VorbisTag[] = [];
    let cover: string | undefined;

    if (job.sourceFormat === "flac") {
      audioInput = path.join(workDir, "decoded.wav");
      await this.decodeFlac(job.sourcePath, audioInput, signal);
      tags = await this.exportTags(job.sourcePath, signal);

      if (job.copyImage && supportsCoverArt(job.targetFormat)) {
        cover = await this.extractCover(job.sourcePath, workDir, warnings, signal);
      }
    }

    switch (job.targetFormat) {
      case "opus":
        await this.encodeOpus(job.quality, audioInput, tempOutput, tags, cover, warnings, signal);
        break;
      case "flac":
        await this.encodeFlac(job.quality, audioInput, tempOutput, tags, cover, warnings, signal);
        break;
      case "aac":
        await this.encodeAac(job.quality, audioInput, tempOutput, tags, cover, warnings, signal);
        break;
    }
  }

  private async decodeFlac(input: string, output: string, signal?: AbortSignal): Promise<void> {
    await this.run(
      "flac",
      ["--decode", "--force", "--no-utf8-convert", "--silent", "-o", output, input],
      signal,
    );
  }

  private async exportTags(input: string, signal?: AbortSignal): Promise<VorbisTag[]> {
    const result = await this.run(
      "metaflac",
      ["--no-utf8-convert", "--export-tags-to=-", input],
      signal,
      { stdoutLimit: Infinity },
    );
    return parseVorbisComments(result.stdout);
  }

  private async extractCover(
    input: string,
    workDir: string,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const extracted = path.join(workDir, "cover");
    try {
      await this.run("metaflac", [`--export-picture-to=${extracted}`, input], signal);
      const prepared = await prepareCover(extracted);
      return prepared.path;
    } catch (err) {
      if (err instanceof StepCancelled || signal?.aborted) throw err;
      warnings.push(`Cover image not copied: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async encodeOpus(
    quality: number,
    input: string,
    output: string,
    tags: readonly VorbisTag[],
    cover: string | undefined,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    const args = ["--quiet", "--comp", opusComplexity(quality)];
    for (const tag of tags) {
      args.push("--comment", `${tag.key}=${tag.value}`);
    }

    if (!cover) {
      await this.run("opusenc", [...args, input, output], signal);
      return;
    }

    // opusenc only takes the picture while encoding, so a rejected cover means a second pass without it
    try {
      await this.run("opusenc", [...args, "--picture", cover, input, output], signal);
    } catch (err) {
      if (err instanceof StepCancelled || signal?.aborted) throw err;
      warnings.push(`Cover image not embedded: ${errorMessage(err)}`);
      await this.run("opusenc", [...args, input, output], signal);
    }
  }

  private async encodeFlac(
    quality: number,
    input: string,
    output: string,
    tags: readonly VorbisTag[],
    cover: string | undefined,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    const args = ["--silent", flacCompressionLevel(quality)];
    for (const tag of tags) {
      args.push("-T", `${tag.key}=${tag.value}`);
    }
    args.push("-o", output, input);
    await this.run("flac", args, signal);

    if (cover) {
      try {
        await this.run("metaflac", [`--import-picture-from=${cover}`, output], signal);
      } catch (err) {
        if (err instanceof StepCancelled || signal?.aborted) throw err;
        warnings.push(`Cover image not embedded: ${errorMessage(err)}`);
      }
    }
  }

  private async encodeAac(
    quality: number,
    input: string,
    output: string,
    tags: readonly VorbisTag[],
    cover: string | undefined,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    await this.run("neroAacEnc", ["-q", aacQuality(quality), "-if", input, "-of", output], signal);

    const neroTags = toNeroTags(tags);
    if (neroTags.length > 0) {
      await this.run(
        "neroAacTag",
        [output, ...neroTags.map((tag) => `-meta:${tag.key}=${tag.value}`)],
        signal,
      );
    }

    if (cover) {
      try {
        await this.run("neroAacTag", [output, `-add-cover:front:${cover}`], signal);
      } catch (err) {
        if (err instanceof StepCancelled || signal?.aborted) throw err;
        warnings.push(`Cover image not embedded: ${errorMessage(err)}`);
      }
    }
  }

  private async run(
    tool: ToolName,
    args: string[],
    signal?: AbortSignal,
    capture: Pick<ExecuteOptions, "stdoutLimit"> = {},
  ): Promise<CommandResult> {
    const command = this.tools[tool];
    if (!command) {
      throw new StepFailure(`Required executable ${tool} was not located`, null, "");
    }

    let result: CommandResult;
    try {
      result = await this.executor.execute(command, args, {
        ...capture,
        timeoutMs: this.options.timeoutMs,
        signal,
      });
    } catch (err) {
      throw new StepFailure(`Failed to start ${tool}: ${errorMessage(err)}`, null, "");
    }

    const output = tail(result.stderr || result.stdout);

    if (result.cancelled) {
      throw new StepCancelled(output);
    }
    if (result.timedOut) {
      throw new StepFailure(
        `${tool} timed out after ${Math.round(this.options.timeoutMs / 1000)}s`,
        result.exitCode,
        output,
      );
    }
    if (result.exitCode !== 0) {
      throw new StepFailure(`${tool} exited with code ${result.exitCode}`, result.exitCode, output);
    }

    return result;
  }
}
