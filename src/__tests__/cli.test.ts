import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import { cleanup, listFiles, tmpDir, writeFlac } from "./helpers.js";

const execFileAsync = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

// Plain output so assertions can match reporter lines exactly
function exec(args: string[]): Promise<{ stdout: string; stderr: string }> {
  return execFileAsync(TSX, [CLI, ...args], { env: { ...process.env, FORCE_COLOR: "0" } });
}

// The stand-in encoders are /bin/sh scripts
const posixOnly = it.skipIf(process.platform === "win32");

const FAKE_FLAC = `#!/bin/sh
out=""
last=""
while [ "$#" -gt 0 ]; do
  if [ "$1" = "-o" ]; then out="$2"; shift; fi
  last="$1"
  shift
done
case "$last" in
  *broken*) echo "flac: ERROR while decoding $last" >&2; exit 1 ;;
esac
printf 'RIFF----WAVEdata' > "$out"
`;

const FAKE_METAFLAC = `#!/bin/sh
for arg in "$@"; do
  if [ "$arg" = "--export-tags-to=-" ]; then echo "TITLE=Test"; fi
done
exit 0
`;

const FAKE_OPUSENC = `#!/bin/sh
for arg in "$@"; do last="$arg"; done
printf 'OggS' > "$last"
`;

async function writeTools(binDir: string): Promise<void> {
  await fs.mkdir(binDir, { recursive: true });
  const tools: Record<string, string> = { flac: FAKE_FLAC, metaflac: FAKE_METAFLAC, opusenc: FAKE_OPUSENC };
  for (const [name, script] of Object.entries(tools)) {
    const file = path.join(binDir, name);
    await fs.writeFile(file, script);
    await fs.chmod(file, 0o755);
  }
}

interface ExecFailure {
  code: number;
  stdout: string;
  stderr: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null && "code" in err && "stderr" in err;
}

async function runFailing(args: string[]): Promise<ExecFailure> {
  try {
    await exec(args);
  } catch (err: unknown) {
    if (isExecFailure(err)) return err;
    throw err;
  }
  throw new Error("should have thrown");
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(["--help"]);
    expect(stdout).toContain("tunemirror");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--encoding_quality");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(["--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("exits with error on no arguments", async () => {
    const error = await runFailing([]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("no input file or folder specified");
  });

  it("exits with error on unknown flag", async () => {
    const error = await runFailing(["--badopt"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("unknown option: --badopt");
  });

  it("exits with error on out-of-range quality", async () => {
    const error = await runFailing([workDir, "-q", "101"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("encoding_quality must be an integer between 0 and 100");
  });

  posixOnly("exits with error on a missing input path", async () => {
    const binDir = path.join(workDir, "bin");
    await writeTools(binDir);

    const error = await runFailing([path.join(workDir, "nope"), "--bin_dir", binDir, "-o", path.join(workDir, "out")]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("Input path does not exist");
  });

  posixOnly("transcodes a nested folder with the external tools", async () => {
    const binDir = path.join(workDir, "bin");
    const inDir = path.join(workDir, "in");
    const outDir = path.join(workDir, "out");
    await writeTools(binDir);
    await writeFlac(path.join(inDir, "a.flac"));
    await writeFlac(path.join(inDir, "sub", "b.flac"));

    const { stdout } = await exec([inDir, "-r", "-s", "flac", "-t", "opus", "-o", outDir, "--bin_dir", binDir]);

    expect(stdout).toContain("  Total files: 2");
    expect(stdout).toContain("  Succeeded:   2");
    expect(await listFiles(outDir)).toEqual(["a.opus", path.join("sub", "b.opus")]);
  });

  posixOnly("exits non-zero when a file fails but finishes the rest", async () => {
    const binDir = path.join(workDir, "bin");
    const inDir = path.join(workDir, "in");
    const outDir = path.join(workDir, "out");
    await writeTools(binDir);
    await writeFlac(path.join(inDir, "a.flac"));
    await writeFlac(path.join(inDir, "broken.flac"));

    const error = await runFailing([inDir, "-o", outDir, "--bin_dir", binDir, "--verbose"]);

    expect(error.code).toBe(1);
    expect(error.stdout).toContain("  Failed:      1");
    expect(error.stderr).toContain("FAIL broken.flac: flac exited with code 1");
    expect(error.stderr).toContain(`flac: ERROR while decoding ${path.join(inDir, "broken.flac")}`);
    expect(await listFiles(outDir)).toEqual(["a.opus"]);
  });

  posixOnly("fails up front when an encoder is missing", async () => {
    const binDir = path.join(workDir, "bin");
    await fs.mkdir(binDir, { recursive: true });
    await writeFlac(path.join(workDir, "in", "a.flac"));

    const error = await runFailing([
      path.join(workDir, "in"),
      "-s", "wave",
      "-t", "aac",
      "-o", path.join(workDir, "out"),
      "--bin_dir", binDir,
    ]);

    // neroAacEnc is never on a test machine's PATH
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("Cannot locate required executable neroAacEnc");
  });
});
