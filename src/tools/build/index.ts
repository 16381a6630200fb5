import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { Buck2Runner } from "../../execution/runner.js";
import type { CommandResult } from "../../types/result.js";
import { registerTool } from "../helpers.js";

export async function buildTargets(runner: Buck2Runner, targets: string): Promise<CommandResult> {
  return runner.run(["build", targets]);
}

export async function testTargets(runner: Buck2Runner, targets: string): Promise<CommandResult> {
  return runner.run(["test", targets]);
}

export function registerBuildTools(ctx: PluginContext): void {
  registerTool(ctx, {
    name: "buck2_build",
    description: "Build Buck2 targets.",
    inputSchema: { targets: z.string().min(1).describe("Target patterns to build (e.g. '//...', '//path/to:target')") },
    annotations: { readOnlyHint: false, destructiveHint: false },
  }, async (args) => buildTargets(ctx.runner, args.targets));

  registerTool(ctx, {
    name: "buck2_test",
    description: "Run Buck2 tests.",
    inputSchema: { targets: z.string().min(1).describe("Test target patterns (e.g. '//...', '//path/to:test')") },
    annotations: { readOnlyHint: false, destructiveHint: false },
  }, async (args) => testTargets(ctx.runner, args.targets));
}
