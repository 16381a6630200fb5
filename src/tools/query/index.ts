import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { Buck2Runner } from "../../execution/runner.js";
import type { CommandResult, QueryResult } from "../../types/result.js";
import { registerTool } from "../helpers.js";
import { logger } from "../../logger.js";

export const DEFAULT_OUTPUT_FORMAT = "json";
export const DEFAULT_TARGET_PATTERN = "//...";

/**
 * Run `buck2 cquery`. For JSON output, a successful run also gets `parsed_output`;
 * stdout that does not decode is returned raw with the field left off.
 */
export async function queryTargets(
  runner: Buck2Runner,
  query: string,
  outputFormat: string = DEFAULT_OUTPUT_FORMAT,
): Promise<QueryResult> {
  const result = await runner.run(["cquery", query, "--output-format", outputFormat]);
  if (outputFormat !== "json" || !result.success) return result;

  try {
    const parsed: unknown = JSON.parse(result.stdout);
    return { ...result, parsed_output: parsed };
  } catch (err) {
    logger.debug({ error: err instanceof Error ? err.message : String(err) }, "cquery stdout is not valid JSON — returning raw output");
    return result;
  }
}

export async function listTargets(runner: Buck2Runner, pattern: string = DEFAULT_TARGET_PATTERN): Promise<CommandResult> {
  return runner.run(["targets", pattern]);
}

export function registerQueryTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "buck2_query",
    description: "Query the Buck2 configured build graph (cquery).",
    inputSchema: {
      query: z.string().min(1).describe("Buck2 query expression (e.g. 'deps(//...)', 'kind(rust_binary, //...)')"),
      output_format: z.string().min(1).optional().default(DEFAULT_OUTPUT_FORMAT).describe("Output format: json, dot, thrift_binary"),
    },
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => queryTargets(ctx.runner, args.query, args.output_format));

  registerTool(ctx, {
    name: "buck2_targets",
    description: "List Buck2 targets matching a pattern.",
    inputSchema: {
      pattern: z.string().min(1).optional().default(DEFAULT_TARGET_PATTERN).describe("Target pattern to list (default: '//...')"),
    },
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => listTargets(ctx.runner, args.pattern));
}
