import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import type { CommandExecutor, ExecuteOptions } from "../executor.js";
import type { CommandResult, ConversionJob, ToolPaths } from "../types.js";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `tunemirror-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function writeFlac(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, Buffer.concat([Buffer.from("fLaC", "latin1"), Buffer.alloc(32)]));
}

export async function writeWave(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "latin1");
  header.writeUInt32LE(36, 4);
  header.write("WAVE", 8, "latin1");
  header.write("fmt ", 12, "latin1");
  await fs.writeFile(filePath, header);
}

export function makeJob(id: number, overrides: Partial<ConversionJob> = {}): ConversionJob {
  return {
    id,
    sourcePath: `/music/track${id}.flac`,
    relativePath: `track${id}.flac`,
    outputPath: `/out/track${id}.opus`,
    sourceFormat: "flac",
    targetFormat: "opus",
    quality: 50,
    copyImage: false,
    overwrite: false,
    ...overrides,
  };
}

export const FAKE_TOOLS: ToolPaths = {
  flac: "/opt/fake/flac",
  metaflac: "/opt/fake/metaflac",
  opusenc: "/opt/fake/opusenc",
  neroAacEnc: "/opt/fake/neroAacEnc",
  neroAacTag: "/opt/fake/neroAacTag",
};

export type FakeHandler = (
  args: readonly string[],
  options: ExecuteOptions,
) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

export interface FakeCall {
  tool: string;
  args: string[];
}

function valueAfter(args: readonly string[], flag: string): string {
  const index = args.indexOf(flag);
  const value = index >= 0 ? args[index + 1] : undefined;
  if (value === undefined) throw new Error(`fake tool: missing ${flag}`);
  return value;
}

function lastArg(args: readonly string[]): string {
  const value = args[args.length - 1];
  if (value === undefined) throw new Error("fake tool: no arguments");
  return value;
}

/** Handlers that behave like the real tools as far as files go. */
export function toolHandlers(overrides: Record<string, FakeHandler> = {}): Record<string, FakeHandler> {
  return {
    flac: async (args) => {
      await fs.writeFile(valueAfter(args, "-o"), "RIFF----WAVEdata");
      return {};
    },
    metaflac: async (args) => {
      if (args.includes("--export-tags-to=-")) {
        return { stdout: "TITLE=Test Song\nartist=Someone\n" };
      }
      return { exitCode: 1, stderr: "metaflac: no PICTURE block" };
    },
    opusenc: async (args) => {
      await fs.writeFile(lastArg(args), "OggS-opus");
      return {};
    },
    neroAacEnc: async (args) => {
      await fs.writeFile(valueAfter(args, "-of"), "ftyp-m4a");
      return {};
    },
    neroAacTag: () => ({}),
    ...overrides,
  };
}

/** Stands in for ProcessExecutor; records every invocation. */
export class FakeExecutor implements CommandExecutor {
  readonly calls: FakeCall[] = [];
  active = 0;
  peak = 0;

  constructor(
    private readonly handlers: Record<string, FakeHandler> = toolHandlers(),
    private readonly delayMs = 0,
  ) {}

  async execute(command: string, args: readonly string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const tool = path.basename(command);
    this.calls.push({ tool, args: [...args] });
    this.active++;
    this.peak = Math.max(this.peak, this.active);

    try {
      if (this.delayMs > 0) await sleep(this.delayMs);
      const handler = this.handlers[tool];
      if (!handler) throw new Error(`spawn ${command} ENOENT`);
      const result = await handler(args, options);
      return { exitCode: 0, stdout: "", stderr: "", timedOut: false, cancelled: false, ...result };
    } finally {
      this.active--;
    }
  }

  callsTo(tool: string): FakeCall[] {
    return this.calls.filter((call) => call.tool === tool);
  }
}

export async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  const entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix === "" ? entry.name : path.join(prefix, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)));
    } else {
      files.push(relative);
    }
  }
  return files.sort();
}
