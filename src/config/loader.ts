// Config loader — reads ~/.config/buck2-mcp/config.yaml (or $BUCK2_MCP_CONFIG) and fills
// in defaults for every key the file leaves out. Environment overrides apply last.
// Config shape is defined in src/types/config.ts — add new fields there and in ConfigSchema.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { PluginConfig } from "../types/config.js";
import { Buck2McpError, Buck2McpErrorCode, describeIssues } from "../shared/errors.js";
import { MAX_TIMEOUT_SECONDS } from "../execution/runner.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "buck2-mcp", "config.yaml");

const ConfigSchema = z.object({
  buck2: z.object({
    binary: z.string().min(1).default("buck2"),
    command_timeout_seconds: z.number().int().nonnegative().max(MAX_TIMEOUT_SECONDS).default(0),
  }).default({}),
  discovery: z.object({
    build_file_name: z.string().min(1).default("BUCK"),
    ignore_dirs: z.array(z.string()).default(["buck-out", ".git"]),
  }).default({}),
});

export interface ConfigResult {
  config: PluginConfig;
  configPath: string;
  fromFile: boolean;
}

/** Validate a parsed YAML document (null for an empty file) against the schema. */
export function parseConfig(raw: unknown): PluginConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Buck2McpError(Buck2McpErrorCode.INVALID_CONFIG, "Configuration failed validation", {
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

export function defaultConfig(): PluginConfig {
  return parseConfig({});
}

function applyEnvOverrides(config: PluginConfig, env: NodeJS.ProcessEnv): PluginConfig {
  const binary = env.BUCK2_BINARY;
  if (binary) {
    return { ...config, buck2: { ...config.buck2, binary } };
  }
  return config;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env.BUCK2_MCP_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "No config file found — using defaults");
    return { config: applyEnvOverrides(defaultConfig(), env), configPath, fromFile: false };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const config = parseConfig(parseYaml(raw));
    return { config: applyEnvOverrides(config, env), configPath, fromFile: true };
  } catch (err) {
    logger.error({ configPath, err }, "Failed to load config — using defaults");
    return { config: applyEnvOverrides(defaultConfig(), env), configPath, fromFile: false };
  }
}
