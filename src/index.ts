#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { Buck2Runner } from "./execution/runner.js";
import { ToolRegistry } from "./tools/registry.js";
import { ResourceRegistry } from "./resources/registry.js";
import type { PluginContext } from "./tools/context.js";
import { registerBuildTools } from "./tools/build/index.js";
import { registerQueryTools } from "./tools/query/index.js";
import { registerResources } from "./resources/index.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  logger.info("Starting buck2-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, binary: config.buck2.binary }, "Configuration loaded");

  // ── Phase 2: Build the runner and context ─────────────────────
  const runner = new Buck2Runner(new LocalExecutor(), {
    binary: config.buck2.binary,
    timeoutSeconds: config.buck2.command_timeout_seconds,
  });
  const ctx: PluginContext = {
    config,
    runner,
    registry: new ToolRegistry(),
    resources: new ResourceRegistry(),
  };

  // ── Phase 3: Register tools and resources ─────────────────────
  registerBuildTools(ctx);
  registerQueryTools(ctx);
  registerResources(ctx);
  logger.info({ tools: ctx.registry.size, resources: ctx.resources.size }, "All modules registered");

  // ── Phase 4: Connect transport ────────────────────────────────
  const server = createServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("buck2-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal startup error");
  process.exit(1);
});
