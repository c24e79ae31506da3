import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { Reporter } from "../reporter.js";
import { makeJob } from "./helpers.js";
import type { OutputSink } from "../reporter.js";
import type { TranscodeSummary, Verbosity } from "../types.js";

function capture(): OutputSink & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, log: (line) => out.push(line), error: (line) => err.push(line) };
}

function reporter(verbosity: Verbosity, sink: OutputSink): Reporter {
  return new Reporter({ verbosity, sink, colors: new Chalk({ level: 0 }) });
}

const SUMMARY: TranscodeSummary = {
  totalFiles: 3,
  succeeded: 1,
  withWarnings: 1,
  skipped: 1,
  failed: [{ file: "/music/track3.flac", error: "opusenc exited with code 1", exitCode: 1, output: "Error parsing input" }],
  outputBytes: 2048,
  durationMs: 65000,
  cancelled: false,
  exitCode: 1,
};

describe("Reporter", () => {
  it("prints one line per finished job in normal mode", () => {
    const sink = capture();
    const r = reporter("normal", sink);

    r.begin(3, "/music", "/out");
    r.jobStarted(makeJob(1), 0);
    r.jobFinished({ status: "succeeded", job: makeJob(1), exitCode: 0, outputBytes: 10, warnings: [], durationMs: 1 });
    r.jobFinished({ status: "skipped", job: makeJob(2), reason: "exists", durationMs: 0 });
    r.jobFinished({
      status: "failed",
      job: makeJob(3),
      error: "opusenc exited with code 1",
      exitCode: 1,
      output: "Error parsing input",
      durationMs: 1,
    });

    expect(sink.out).toEqual([
      "Found 3 files in /music, writing to /out",
      "[1/3] done track1.flac",
      "[2/3] skip track2.flac (exists)",
    ]);
    expect(sink.err).toEqual(["[3/3] FAIL track3.flac: opusenc exited with code 1"]);
  });

  it("adds start lines, warnings and tool output in verbose mode", () => {
    const sink = capture();
    const r = reporter("verbose", sink);

    r.begin(2, "/music", "/out");
    r.jobStarted(makeJob(1), 1);
    r.jobFinished({
      status: "succeeded",
      job: makeJob(1),
      exitCode: 0,
      outputBytes: 10,
      warnings: ["Cover image not copied: no picture"],
      durationMs: 1,
    });
    r.jobFinished({
      status: "failed",
      job: makeJob(2),
      error: "flac exited with code 1",
      exitCode: 1,
      output: "line one\nline two",
      durationMs: 1,
    });

    expect(sink.out).toEqual([
      "Found 2 files in /music, writing to /out",
      "start track1.flac -> /out/track1.opus [slot 2]",
      "[1/2] done track1.flac (1 warning)",
      "      warning: Cover image not copied: no picture",
    ]);
    expect(sink.err).toEqual([
      "[2/2] FAIL track2.flac: flac exited with code 1",
      "      line one",
      "      line two",
    ]);
  });

  it("prints only the summary in silent mode", () => {
    const sink = capture();
    const r = reporter("silent", sink);

    r.begin(3, "/music", "/out");
    r.jobFinished({ status: "skipped", job: makeJob(1), reason: "exists", durationMs: 0 });
    r.summary(SUMMARY);

    expect(sink.err).toEqual([]);
    expect(sink.out).toEqual([
      "",
      "Transcode completed:",
      "  Total files: 3",
      "  Succeeded:   1 (1 with warnings)",
      "  Skipped:     1",
      "  Failed:      1",
      "  Duration:    1m 5s",
      "  Output size: 2.00 KB",
      "",
      "Failed conversions:",
      "  - /music/track3.flac: opusenc exited with code 1",
    ]);
  });

  it("includes tool output under each failure when verbose", () => {
    const sink = capture();
    reporter("verbose", sink).summary(SUMMARY);

    expect(sink.out.slice(-2)).toEqual([
      "  - /music/track3.flac: opusenc exited with code 1",
      "      Error parsing input",
    ]);
  });

  it("names a cancelled run", () => {
    const sink = capture();
    reporter("normal", sink).summary({ ...SUMMARY, failed: [], cancelled: true, exitCode: 130 });
    expect(sink.out[1]).toBe("Transcode cancelled:");
  });
});
