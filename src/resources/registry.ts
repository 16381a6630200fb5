import type { RegisteredResource } from "../types/tool.js";
import { Buck2McpErrorCode } from "../shared/errors.js";
import { Registry } from "../shared/registry.js";

/** Fixed-URI resources served through resources/read. */
export class ResourceRegistry extends Registry<RegisteredResource> {
  constructor() {
    super("resource", (resource) => resource.metadata.uri, Buck2McpErrorCode.UNKNOWN_RESOURCE);
  }

  async read(uri: string): Promise<string> {
    return this.require(uri).read();
  }
}
