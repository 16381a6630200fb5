import type { ZodError } from 'zod';

export enum Buck2McpErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
  UNKNOWN_RESOURCE = 'UNKNOWN_RESOURCE',
}

/** Internal fault raised by this server, as opposed to a buck2 failure (which is a result). */
export class Buck2McpError extends Error {
  readonly code: Buck2McpErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: Buck2McpErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'Buck2McpError';
    this.code = code;
    this.context = context;
  }
}

/** One line per zod issue: `path: message`. */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}

export function invalidArguments(tool: string, error: ZodError): Buck2McpError {
  return new Buck2McpError(Buck2McpErrorCode.INVALID_ARGUMENTS, `Invalid arguments for ${tool}`, {
    issues: describeIssues(error),
  });
}

/** Render an error the way the server surfaces it to the agent. */
export function formatError(err: unknown): string {
  if (err instanceof Buck2McpError) {
    const ctxLines = err.context && Object.keys(err.context).length > 0
      ? '\n' + Object.entries(err.context).map(([k, v]) => `  ${k}: ${String(v)}`).join('\n')
      : '';
    return `Buck2 MCP Error [${err.code}]: ${err.message}${ctxLines}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Body of a tool call that threw instead of producing a CommandResult. */
export interface ToolErrorEnvelope {
  readonly success: false;
  readonly tool: string;
  readonly error: string;
}

export function toErrorEnvelope(tool: string, err: unknown): ToolErrorEnvelope {
  return { success: false, tool, error: formatError(err) };
}
