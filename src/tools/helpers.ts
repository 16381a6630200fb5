import { z } from "zod";
import type { PluginContext } from "./context.js";
import type { ToolMetadata } from "../types/tool.js";
import type { CommandResult } from "../types/result.js";
import { invalidArguments } from "../shared/errors.js";

/**
 * Register a tool whose arguments are validated against its own input shape.
 * The handler receives the parsed, typed arguments; a mismatch throws INVALID_ARGUMENTS.
 */
export function registerTool<Shape extends z.ZodRawShape>(
  ctx: PluginContext,
  metadata: ToolMetadata & { readonly inputSchema: Shape },
  handler: (args: z.objectOutputType<Shape, z.ZodTypeAny, "strip">) => Promise<CommandResult>,
): void {
  const schema = z.object(metadata.inputSchema);
  ctx.registry.register({
    metadata,
    execute: async (args) => {
      const parsed = schema.safeParse(args);
      if (!parsed.success) throw invalidArguments(metadata.name, parsed.error);
      return handler(parsed.data);
    },
  });
}
