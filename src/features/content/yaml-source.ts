/**
 * File-backed content source.
 *
 * Reads every `*.yml` / `*.yaml` file in `.fedsearch/content/`.  A file
 * holds either one item or an `items:` list; each item is validated
 * against `content-item.schema.json` (which fills in defaults).
 *
 * ```yaml
 * items:
 *   - id: 42
 *     type: post
 *     status: publish
 *     title: Spring collection
 *     content: "<p>Linen and cotton…</p>"
 * ```
 */
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { ContentItem, ContentSource } from "../../shared/types/content.js";
import { readYamlFile } from "../../shared/yaml.js";
import { contentDir } from "../../shared/paths.js";
import { schemaRegistry, type SchemaRegistry } from "../../shared/schema.js";

export interface YamlContentSourceOptions {
  /** Site root (default: cwd). */
  root?: string;
  /** Explicit content directory. */
  dir?: string;
  registry?: SchemaRegistry;
}

export class YamlContentSource implements ContentSource {
  private readonly dir: string;
  private readonly registry: SchemaRegistry;
  private items: ContentItem[] | undefined;

  constructor(options: YamlContentSourceOptions = {}) {
    this.dir = options.dir ?? contentDir(options.root);
    this.registry = options.registry ?? schemaRegistry();
  }

  async listByTypeAndStatus(
    types: readonly string[],
    statuses: readonly string[],
    page: number,
    pageSize: number,
  ): Promise<ContentItem[]> {
    const matching = this.load().filter((item) => types.includes(item.type) && statuses.includes(item.status));
    const start = (Math.max(1, page) - 1) * pageSize;
    return matching.slice(start, start + pageSize);
  }

  async get(id: number): Promise<ContentItem | undefined> {
    return this.load().find((item) => item.id === id);
  }

  /** Forget loaded items so the next call re-reads the files. */
  reload(): void {
    this.items = undefined;
  }

  private load(): ContentItem[] {
    if (this.items) return this.items;

    const byId = new Map<number, ContentItem>();
    if (existsSync(this.dir)) {
      const files = readdirSync(this.dir)
        .filter((f) => f.endsWith(".yml") || f.endsWith(".yaml"))
        .sort();
      for (const file of files) {
        const data = readYamlFile(join(this.dir, file));
        const entries = isItemList(data) ? data.items : [data];
        entries.forEach((entry, i) => {
          const item = this.registry.parse<ContentItem>("content-item.schema.json", entry, `content item ${file}#${i}`);
          byId.set(item.id, item);
        });
      }
    }

    this.items = [...byId.values()].sort((a, b) => a.id - b.id);
    return this.items;
  }
}

function isItemList(data: unknown): data is { items: unknown[] } {
  return typeof data === "object" && data !== null && "items" in data && Array.isArray(data.items);
}
