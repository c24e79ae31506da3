import { spawn } from "node:child_process";
import type { CommandResult } from "./types.js";

export interface ExecuteOptions {
  /** Kill the child after this many milliseconds; 0 or undefined for no limit. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /**
   * Characters of stdout to keep, counted from the end. Defaults to 64 KiB;
   * pass `Infinity` when stdout is data to be parsed rather than diagnostics.
   */
  stdoutLimit?: number;
}

/** The only way the encoder adapter reaches an external process. */
export interface CommandExecutor {
  execute(command: string, args: readonly string[], options?: ExecuteOptions): Promise<CommandResult>;
}

const MAX_CAPTURE = 64 * 1024;

function append(buffer: string, chunk: string, limit: number): string {
  const next = buffer + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export class ProcessExecutor implements CommandExecutor {
  execute(command: string, args: readonly string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const { timeoutMs = 0, signal, stdoutLimit = MAX_CAPTURE } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        resolve({ exitCode: null, stdout: "", stderr: "", timedOut: false, cancelled: true });
        return;
      }

      const child = spawn(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let cancelled = false;

      // Decoded through a StringDecoder, so a character split across chunks survives
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (data: string) => {
        stdout = append(stdout, data, stdoutLimit);
      });
      child.stderr.on("data", (data: string) => {
        stderr = append(stderr, data, MAX_CAPTURE);
      });

      const timer = timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeoutMs)
        : undefined;

      const onAbort = (): void => {
        cancelled = true;
        child.kill("SIGTERM");
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      child.on("error", (err) => {
        finish();
        reject(err);
      });

      child.on("close", (code) => {
        finish();
        resolve({ exitCode: code, stdout, stderr, timedOut, cancelled });
      });
    });
  }
}
