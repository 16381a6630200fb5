import { z } from 'zod';
import {
  Buck2McpError,
  Buck2McpErrorCode,
  describeIssues,
  formatError,
  invalidArguments,
  toErrorEnvelope,
} from '../../../src/shared/errors.js';

describe('Buck2McpError', () => {
  it('creates error with code and message', () => {
    const err = new Buck2McpError(Buck2McpErrorCode.UNKNOWN_TOOL, 'No tool registered as x');
    expect(err.code).toBe(Buck2McpErrorCode.UNKNOWN_TOOL);
    expect(err.message).toBe('No tool registered as x');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new Buck2McpError(Buck2McpErrorCode.INVALID_CONFIG, 'bad', { issues: 'buck2.binary: too short' });
    expect(err.context).toEqual({ issues: 'buck2.binary: too short' });
  });
});

describe('formatError', () => {
  it('renders code, message and context lines', () => {
    const err = new Buck2McpError(Buck2McpErrorCode.INVALID_CONFIG, 'bad', { issues: 'x' });
    expect(formatError(err)).toBe('Buck2 MCP Error [INVALID_CONFIG]: bad\n  issues: x');
  });

  it('uses the plain message for other errors', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('raw')).toBe('raw');
  });
});

describe('invalidArguments', () => {
  it('lists every zod issue by path', () => {
    const parsed = z.object({ targets: z.string().min(1), depth: z.number() }).safeParse({ targets: 3 });
    if (parsed.success) throw new Error('expected a validation failure');

    const err = invalidArguments('buck2_build', parsed.error);

    expect(err.code).toBe(Buck2McpErrorCode.INVALID_ARGUMENTS);
    expect(err.message).toBe('Invalid arguments for buck2_build');
    expect(err.context).toEqual({ issues: describeIssues(parsed.error) });
    expect(describeIssues(parsed.error)).toMatch(/^targets: .+; depth: .+$/);
  });
});

describe('toErrorEnvelope', () => {
  it('wraps a server error with the tool name', () => {
    const err = new Buck2McpError(Buck2McpErrorCode.UNKNOWN_TOOL, 'No tool registered as x');
    expect(toErrorEnvelope('x', err)).toEqual({
      success: false,
      tool: 'x',
      error: 'Buck2 MCP Error [UNKNOWN_TOOL]: No tool registered as x',
    });
  });

  it('wraps a plain error by message', () => {
    expect(toErrorEnvelope('buck2_build', new Error('boom'))).toEqual({ success: false, tool: 'buck2_build', error: 'boom' });
  });
});
