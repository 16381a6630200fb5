import type { Executor } from "./executor.js";
import type { CommandResult } from "../types/result.js";
import { logger } from "../logger.js";

/** Conventional "command not found" exit status. */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

/** Largest delay a Node timer accepts; anything above fires after 1 ms instead. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);

// Spawn errors that mean the binary itself could not be located or executed.
const NOT_FOUND_CODES = new Set(["ENOENT", "EACCES"]);

export interface RunnerOptions {
  readonly binary: string;
  /** 0 disables the timeout. */
  readonly timeoutSeconds: number;
}

/**
 * Runs `<binary> <args...>` and normalises the outcome into a CommandResult.
 * Never rejects on process failure: a missing binary becomes exit code 127 and any
 * non-zero exit is returned as an ordinary unsuccessful result.
 */
export class Buck2Runner {
  constructor(
    private readonly executor: Executor,
    private readonly options: RunnerOptions,
  ) {}

  async run(args: string[], cwd?: string): Promise<CommandResult> {
    const argv = [this.options.binary, ...args];
    const command = argv.join(" ");
    const workDir = cwd ?? process.cwd();

    const outcome = await this.executor.execute(
      { argv, cwd: workDir },
      { timeoutMs: Math.min(this.options.timeoutSeconds * 1000, MAX_TIMEOUT_MS) },
    );

    if (outcome.status === "spawn_failed") {
      if (NOT_FOUND_CODES.has(outcome.code)) {
        logger.warn({ argv, cwd: workDir, code: outcome.code }, "buck2 binary could not be started");
        return {
          success: false,
          stdout: "",
          stderr: `${this.options.binary} command not found. Please ensure Buck2 is installed and '${this.options.binary}' is on PATH (or set BUCK2_BINARY).`,
          exit_code: COMMAND_NOT_FOUND_EXIT_CODE,
          command,
        };
      }
      logger.error({ argv, cwd: workDir, code: outcome.code, error: outcome.message }, "Failed to spawn buck2");
      return { success: false, stdout: "", stderr: outcome.message, exit_code: 1, command };
    }

    logger.debug({ argv, cwd: workDir, exitCode: outcome.exitCode, durationMs: outcome.durationMs }, "buck2 command finished");
    return {
      success: outcome.exitCode === 0,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      exit_code: outcome.exitCode,
      command,
    };
  }
}
