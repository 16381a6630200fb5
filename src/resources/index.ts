import type { PluginContext } from "../tools/context.js";
import { readBuckConfig } from "./config.js";
import { readProjectRoot } from "./root.js";

export const CONFIG_RESOURCE_URI = "buck2-config://";
export const ROOT_RESOURCE_URI = "buck2-root://";

export function registerResources(ctx: PluginContext): void {
  ctx.resources.register({
    metadata: {
      name: "buck2-config",
      uri: CONFIG_RESOURCE_URI,
      description: "Buck2 configuration from .buckconfig and .buckconfig.local in the working directory",
      mimeType: "application/json",
    },
    read: () => readBuckConfig(),
  });

  ctx.resources.register({
    metadata: {
      name: "buck2-root",
      uri: ROOT_RESOURCE_URI,
      description: "Buck2 project root and the build files beneath it",
      mimeType: "application/json",
    },
    read: () => readProjectRoot(ctx.runner, {
      buildFileName: ctx.config.discovery.build_file_name,
      ignoreDirs: ctx.config.discovery.ignore_dirs,
    }),
  });
}
