import type { z } from "zod";
import type { CommandResult } from "./result.js";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodRawShape;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool with its execute function. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>) => Promise<CommandResult>;
}

/** Metadata for a read-only MCP resource addressed by a fixed URI. */
export interface ResourceMetadata {
  readonly name: string;
  readonly uri: string;
  readonly description: string;
  readonly mimeType: string;
}

/** A registered resource; `read` always resolves to serialized text. */
export interface RegisteredResource {
  readonly metadata: ResourceMetadata;
  readonly read: () => Promise<string>;
}
