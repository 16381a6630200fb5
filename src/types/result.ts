/** Normalised outcome of one buck2 invocation, serialized back to the agent as-is. */
export interface CommandResult {
  readonly success: boolean;
  readonly stdout: string;
  readonly stderr: string;
  readonly exit_code: number;
  readonly command: string;
}

/**
 * Result of `buck2 cquery`. `parsed_output` is only present when JSON output was
 * requested, the run succeeded and stdout decoded cleanly.
 */
export interface QueryResult extends CommandResult {
  readonly parsed_output?: unknown;
}
