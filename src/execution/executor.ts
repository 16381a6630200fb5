// Command execution layer — every buck2 invocation passes through this module.
// Provides the Executor interface; LocalExecutor is the sole implementation today.
// LocalExecutor.execute() is the hard boundary between tool code and the OS: it never
// rejects, reporting spawn failures as an ExecOutcome instead.
import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";
import { constants } from "node:os";
import type { Command } from "../types/command.js";

/** The process started and ran to completion (or was killed). */
export interface ExitedOutcome {
  readonly status: "exited";
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** The process could not be started at all. */
export interface SpawnFailedOutcome {
  readonly status: "spawn_failed";
  readonly code: string;
  readonly message: string;
  readonly durationMs: number;
}

export type ExecOutcome = ExitedOutcome | SpawnFailedOutcome;

export interface ExecOptions {
  /** Kill the child with SIGTERM after this many ms; 0 waits indefinitely. */
  readonly timeoutMs?: number;
}

/** Executor interface — the runner only ever talks to this. */
export interface Executor {
  execute(command: Command, options?: ExecOptions): Promise<ExecOutcome>;
}

/** Shell convention for a signal-terminated process: 128 + signal number. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + constants.signals[signal];
}

/** Local executor using child_process.spawn without a shell. */
export class LocalExecutor implements Executor {
  async execute(command: Command, options?: ExecOptions): Promise<ExecOutcome> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    const elapsed = () => Math.round(performance.now() - start);

    if (cmd === undefined) {
      return { status: "spawn_failed", code: "EINVAL", message: "Empty argv", durationMs: 0 };
    }

    return new Promise<ExecOutcome>((resolve) => {
      let settled = false;
      const settle = (outcome: ExecOutcome) => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      let child: ChildProcessByStdio<null, Readable, Readable>;
      try {
        child = spawn(cmd, args, {
          cwd: command.cwd,
          env: process.env,
          stdio: ["ignore", "pipe", "pipe"],
          timeout: options?.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
        });
      } catch (err) {
        // Invalid arguments (e.g. NUL bytes) throw synchronously instead of emitting 'error'.
        const e = err instanceof Error ? err : new Error(String(err));
        const code = "code" in e && typeof e.code === "string" ? e.code : "UNKNOWN";
        settle({ status: "spawn_failed", code, message: e.message, durationMs: elapsed() });
        return;
      }

      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => { stdout += chunk; });
      child.stderr.on("data", (chunk: string) => { stderr += chunk; });

      // 'error' fires before 'close' when spawn itself fails, so it wins the settle.
      child.on("error", (err: NodeJS.ErrnoException) => {
        settle({
          status: "spawn_failed",
          code: err.code ?? "UNKNOWN",
          message: err.message,
          durationMs: elapsed(),
        });
      });

      child.on("close", (code, signal) => {
        const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        settle({ status: "exited", stdout, stderr, exitCode, durationMs: elapsed() });
      });
    });
  }
}
