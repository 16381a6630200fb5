import type { RegisteredTool } from "../types/tool.js";
import type { CommandResult } from "../types/result.js";
import { Buck2McpErrorCode } from "../shared/errors.js";
import { Registry } from "../shared/registry.js";

/** Tools keyed by name; the server lists them and dispatches tools/call through `call`. */
export class ToolRegistry extends Registry<RegisteredTool> {
  constructor() {
    super("tool", (tool) => tool.metadata.name, Buck2McpErrorCode.UNKNOWN_TOOL);
  }

  async call(name: string, args: Record<string, unknown>): Promise<CommandResult> {
    return this.require(name).execute(args);
  }
}
