import { readFile, readdir, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { ERROR_CODES, createModuleError } from "@adaptest/core/errors";
import { ItemBankFileSchema } from "@adaptest/lib/schema";
import type { ItemTemplate } from "@adaptest/lib/types";
import { filterItemsByTopic } from "@adaptest/modules/engine/irt/selection";
import { parse } from "yaml";

const ITEM_FILE_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

function bankError(message: string) {
  return createModuleError("item-bank", ERROR_CODES.ITEM_BANK_INVALID, message);
}

/** Fixed, pre-validated item bank. Items are immutable once loaded. */
export class ItemBank {
  private items: Map<string, ItemTemplate> = new Map();

  /**
   * Load one YAML or JSON file holding either an array of item templates
   * or `{ items: [...] }`, validate it with Zod and add its items.
   */
  async loadFile(path: string): Promise<number> {
    const content = await readFile(path, "utf8");

    let raw: unknown;
    try {
      raw = extname(path) === ".json" ? JSON.parse(content) : parse(content);
    } catch (err) {
      throw bankError(
        `Failed to parse item file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const result = ItemBankFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw bankError(`Validation failed for ${path}:\n${issues}`);
    }

    this.add(result.data, path);
    return result.data.length;
  }

  /** Recursively load every .yaml, .yml and .json file under a directory. */
  async loadDirectory(dir: string): Promise<number> {
    const entries = await readdir(dir, { recursive: true });
    const files = entries.filter((entry) => ITEM_FILE_EXTENSIONS.has(extname(entry))).sort();

    let loaded = 0;
    for (const file of files) {
      loaded += await this.loadFile(join(dir, file));
    }
    return loaded;
  }

  /** Load a single file or a whole directory, whichever `path` names. */
  async load(path: string): Promise<number> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch (err) {
      throw bankError(
        `Item bank not found: ${path} (${err instanceof Error ? err.message : String(err)})`,
      );
    }
    return isDirectory ? this.loadDirectory(path) : this.loadFile(path);
  }

  /** Add items programmatically. Duplicate ids are rejected before anything is added. */
  add(items: readonly ItemTemplate[], source = "input"): void {
    const incoming = new Set<string>();
    for (const item of items) {
      if (this.items.has(item.id) || incoming.has(item.id)) {
        throw bankError(`Duplicate item ID "${item.id}" found in ${source}.`);
      }
      incoming.add(item.id);
    }
    for (const item of items) {
      this.items.set(item.id, item);
    }
  }

  /** Return all loaded items, in load order. */
  getAll(): ItemTemplate[] {
    return [...this.items.values()];
  }

  /** Items whose topic matches, ignoring case and surrounding whitespace. */
  getByTopic(topic: string): ItemTemplate[] {
    return filterItemsByTopic(this.getAll(), topic);
  }

  /** Get a single item by its ID. */
  getById(id: string): ItemTemplate | undefined {
    return this.items.get(id);
  }

  /** Distinct non-empty topics, sorted. */
  topics(): string[] {
    const topics = new Set<string>();
    for (const item of this.items.values()) {
      if (item.metadata.topic !== "") topics.add(item.metadata.topic);
    }
    return [...topics].sort();
  }

  /** Return the total number of loaded items. */
  count(): number {
    return this.items.size;
  }
}
