import type { PluginConfig } from "../types/config.js";
import type { Buck2Runner } from "../execution/runner.js";
import type { ResourceRegistry } from "../resources/registry.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared plugin context — the glue between all components.
 * Created once at startup, passed to all tool and resource modules.
 */
export interface PluginContext {
  readonly config: PluginConfig;
  readonly runner: Buck2Runner;
  readonly registry: ToolRegistry;
  readonly resources: ResourceRegistry;
}
