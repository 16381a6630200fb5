import { Buck2McpError, type Buck2McpErrorCode } from "./errors.js";
import { logger } from "../logger.js";

/**
 * Keyed store shared by the tool and resource registries. Later registrations under
 * the same key replace earlier ones; lookups of unknown keys throw `missingCode`.
 */
export class Registry<Entry> {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly kind: "tool" | "resource",
    private readonly keyOf: (entry: Entry) => string,
    private readonly missingCode: Buck2McpErrorCode,
  ) {}

  register(entry: Entry): void {
    const key = this.keyOf(entry);
    if (this.entries.has(key)) {
      logger.warn({ kind: this.kind, key }, "Duplicate registration — overwriting");
    }
    this.entries.set(key, entry);
  }

  get(key: string): Entry | undefined {
    return this.entries.get(key);
  }

  /** Like get, but an unknown key is an internal fault. */
  require(key: string): Entry {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      throw new Buck2McpError(this.missingCode, `No ${this.kind} registered as ${key}`);
    }
    return entry;
  }

  getAll(): ReadonlyMap<string, Entry> {
    return this.entries;
  }

  get size(): number {
    return this.entries.size;
  }
}
