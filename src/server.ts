import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { logger } from "./logger.js";
import { toErrorEnvelope } from "./shared/errors.js";
import type { PluginContext } from "./tools/context.js";

export const SERVER_NAME = "buck2-mcp";
export const SERVER_VERSION = "0.1.0";

/** JSON Schema advertised in tools/list. Validation itself happens in the tool's execute. */
export function toInputSchema(shape: z.ZodRawShape): Tool["inputSchema"] {
  const properties: Record<string, object> = {};
  const required: string[] = [];
  for (const [key, field] of Object.entries(shape)) {
    const { $schema: _draft, ...property } = zodToJsonSchema(field, { $refStrategy: "none" });
    properties[key] = property;
    if (!field.isOptional()) required.push(key);
  }
  return required.length > 0
    ? { type: "object", properties, required }
    : { type: "object", properties };
}

/**
 * Build an MCP server exposing every tool and resource registered on `ctx`.
 * Tool failures never escape as protocol errors: anything thrown during a call,
 * argument validation included, comes back as an isError envelope.
 */
export function createServer(ctx: PluginContext): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...ctx.registry.getAll().values()].map(({ metadata }) => ({
      name: metadata.name,
      title: metadata.name,
      description: metadata.description,
      inputSchema: toInputSchema(metadata.inputSchema),
      annotations: {
        readOnlyHint: metadata.annotations?.readOnlyHint ?? false,
        destructiveHint: metadata.annotations?.destructiveHint ?? false,
        idempotentHint: metadata.annotations?.idempotentHint ?? false,
        openWorldHint: metadata.annotations?.openWorldHint ?? false,
      },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      const result = await ctx.registry.call(name, args ?? {});
      return { content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }] };
    } catch (err) {
      logger.error({ tool: name, err }, "Tool execution error");
      return {
        content: [{ type: "text" as const, text: JSON.stringify(toErrorEnvelope(name, err), null, 2) }],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [...ctx.resources.getAll().values()].map(({ metadata }) => ({
      uri: metadata.uri,
      name: metadata.name,
      description: metadata.description,
      mimeType: metadata.mimeType,
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const resource = ctx.resources.require(uri);
    return {
      contents: [{ uri, mimeType: resource.metadata.mimeType, text: await resource.read() }],
    };
  });

  return server;
}
