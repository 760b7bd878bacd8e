/**
 * Index writer.
 *
 * Owns the write path into a search index: settings are applied once
 * per writer before the first write, backend failures surface as
 * {@link IndexUnavailableError}, and {@link IndexWriter.indexAll}
 * rebuilds one scope from its content source in batches.
 */
import type { ContentItem, ContentSource } from "../../shared/types/content.js";
import type { IndexRecord, IndexSettings } from "../../shared/types/records.js";
import { eq, eqAny, formatFilter, type Filter } from "../../shared/filter.js";
import { normalizeScopeUrl, sameScope } from "../../shared/scope.js";
import {
  IndexUnavailableError,
  ScopeNotConfiguredError,
  errorMessage,
  toFederatedSearchError,
} from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import { DEFAULT_INDEX_SETTINGS, type SearchIndexWriter } from "../index-backend/types.js";
import { allowedStatuses, type RecordBuilder } from "./record-builder.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface IndexWriterOptions {
  index: SearchIndexWriter;
  source: ContentSource;
  builder: RecordBuilder;
  settings?: IndexSettings;
  /** Content items per batch (default 100). */
  batchSize?: number;
  logger?: Logger;
}

export interface IndexAllResult {
  /** False when any batch failed. */
  success: boolean;
  /** Records written. */
  written: number;
  failedBatches: number;
  /** Items that produced no records. */
  skipped: number;
}

/** One page of content turned into records. */
interface RecordBatch {
  ok: true;
  page: number;
  items: ContentItem[];
  records: IndexRecord[];
  skipped: number;
}

/** A page whose content could not be read or built. */
interface FailedPage {
  ok: false;
  page: number;
  error: unknown;
}

/** Consecutive unreadable pages after which a rebuild gives up. */
export const MAX_FAILED_PAGES_IN_A_ROW = 3;

const toIndexError = (err: unknown) =>
  toFederatedSearchError(err, (message, options) => new IndexUnavailableError(message, options));

// ── Writer ────────────────────────────────────────────────────────────

export class IndexWriter {
  private readonly index: SearchIndexWriter;
  private readonly source: ContentSource;
  private readonly builder: RecordBuilder;
  private readonly settings: IndexSettings;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private settingsApplied = false;

  constructor(options: IndexWriterOptions) {
    this.index = options.index;
    this.source = options.source;
    this.builder = options.builder;
    this.settings = options.settings ?? DEFAULT_INDEX_SETTINGS;
    this.batchSize = options.batchSize ?? 100;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Scope whose content this writer builds records for. */
  get siteUrl(): string {
    return this.builder.siteUrl;
  }

  get recordBuilder(): RecordBuilder {
    return this.builder;
  }

  /** Push index settings; only the first successful call reaches the backend. */
  async applySettings(): Promise<void> {
    if (this.settingsApplied) return;
    try {
      await this.index.applySettings(this.settings);
    } catch (err: unknown) {
      throw toIndexError(err);
    }
    this.settingsApplied = true;
  }

  async deleteByFilter(filter: Filter): Promise<void> {
    await this.applySettings();
    try {
      await this.index.deleteByFilter(filter);
    } catch (err: unknown) {
      throw toIndexError(err);
    }
  }

  async writeBatch(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.applySettings();
    try {
      await this.index.upsertBatch(records);
    } catch (err: unknown) {
      throw toIndexError(err);
    }
  }

  /** Remove every record of the given scopes. */
  async deleteScopes(scopes: readonly string[]): Promise<void> {
    const filter = eqAny("site_url", scopes.map(normalizeScopeUrl));
    if (filter) await this.deleteByFilter(filter);
  }

  /**
   * Rebuild one scope: delete its records, then write the records of
   * every item of `types` in an allowed status.  A failed batch is
   * logged and counted; the remaining batches still run.
   */
  async indexAll(types: readonly string[], scope: string): Promise<IndexAllResult> {
    if (!sameScope(scope, this.siteUrl)) {
      throw new ScopeNotConfiguredError(`Cannot rebuild ${scope} from the content of ${this.siteUrl}`);
    }

    await this.deleteByFilter(eq("site_url", normalizeScopeUrl(scope)));

    const result: IndexAllResult = { success: true, written: 0, failedBatches: 0, skipped: 0 };
    if (types.length === 0) return result;

    for await (const batch of this.recordBatches(types)) {
      if (!batch.ok) {
        result.failedBatches++;
        result.success = false;
        this.logger.error(`Failed to read batch ${batch.page} of ${this.siteUrl}`, { error: errorMessage(batch.error) });
        continue;
      }
      result.skipped += batch.skipped;
      if (batch.records.length === 0) continue;
      try {
        await this.writeBatch(batch.records);
        result.written += batch.records.length;
      } catch (err: unknown) {
        result.failedBatches++;
        result.success = false;
        this.logger.error(`Failed to write batch ${batch.page} of ${this.siteUrl}`, {
          items: batch.items.map((i) => i.id),
          error: errorMessage(err),
        });
      }
    }

    this.logger.info(`Indexed ${this.siteUrl}`, {
      filter: formatFilter(eq("site_url", this.siteUrl)),
      written: result.written,
      failedBatches: result.failedBatches,
      skipped: result.skipped,
    });
    return result;
  }

  /**
   * Page through the content source, one batch of records per page.  A
   * page that cannot be read or built is reported and skipped; the walk
   * stops on an empty or short page, or after
   * {@link MAX_FAILED_PAGES_IN_A_ROW} failed pages.
   */
  private async *recordBatches(types: readonly string[]): AsyncGenerator<RecordBatch | FailedPage> {
    const statuses = allowedStatuses(types);
    let failedInARow = 0;
    for (let page = 1; ; page++) {
      let batch: RecordBatch;
      try {
        batch = await this.readPage(types, statuses, page);
      } catch (error: unknown) {
        yield { ok: false, page, error };
        if (++failedInARow >= MAX_FAILED_PAGES_IN_A_ROW) return;
        continue;
      }
      failedInARow = 0;
      if (batch.items.length === 0) return;
      yield batch;
      if (batch.items.length < this.batchSize) return;
    }
  }

  private async readPage(types: readonly string[], statuses: readonly string[], page: number): Promise<RecordBatch> {
    const items = await this.source.listByTypeAndStatus(types, statuses, page, this.batchSize);
    const records: IndexRecord[] = [];
    let skipped = 0;
    for (const item of items) {
      const built = this.builder.buildRecords(item);
      if (built.length === 0) skipped++;
      records.push(...built);
    }
    return { ok: true, page, items, records, skipped };
  }
}
