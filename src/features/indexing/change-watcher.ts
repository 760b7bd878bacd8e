/**
 * Change watcher.
 *
 * Reacts to content lifecycle transitions.  The governing site applies
 * changes to the shared index directly; a brand builds the records
 * locally and forwards them to the governing site, which re-checks the
 * change against its own entity map before applying it.
 */
import type { ContentItem } from "../../shared/types/content.js";
import type { IndexRecord } from "../../shared/types/records.js";
import { and, eq } from "../../shared/filter.js";
import { documentId, normalizeScopeUrl } from "../../shared/scope.js";
import { errorMessage } from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { IndexWriter } from "./index-writer.js";
import { allowedStatuses, type RecordBuilder } from "./record-builder.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface ContentChangeEvent {
  oldStatus: string;
  newStatus: string;
  item: ContentItem;
}

export type ChangeAction = "skip" | "deleted" | "upserted" | "error";

export interface ChangeResult {
  ok: boolean;
  action: ChangeAction;
  /** Records written (upserted only). */
  count?: number;
  message?: string;
}

/** A change as applied to the shared index, keyed by the owning scope. */
export interface ScopedChange {
  scopeUrl: string;
  contentId: number;
  contentType: string;
  newStatus: string;
  records: IndexRecord[];
}

/** Body a brand sends to the governing `/reindex-post` endpoint. */
export interface ReindexPostPayload {
  site_url: string;
  post_id: number;
  post_type: string;
  old_status: string;
  post_status: string;
  records: IndexRecord[];
}

/** Content types indexed for a scope. */
export type IndexableTypesLookup = (scopeUrl: string) => Promise<readonly string[]>;

export type ChangeForwarder = (payload: ReindexPostPayload) => Promise<ChangeResult>;

// ── Governing side ────────────────────────────────────────────────────

export interface GoverningChangeApplierOptions {
  writer: IndexWriter;
  indexableTypes: IndexableTypesLookup;
  logger?: Logger;
}

export class GoverningChangeApplier {
  private readonly writer: IndexWriter;
  private readonly indexableTypes: IndexableTypesLookup;
  private readonly logger: Logger;

  constructor(options: GoverningChangeApplierOptions) {
    this.writer = options.writer;
    this.indexableTypes = options.indexableTypes;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Replace one document's records: delete all of them, then write the
   * fresh set when the new status is indexable.  Records that do not
   * belong to the document are dropped.
   */
  async apply(change: ScopedChange): Promise<ChangeResult> {
    const scope = normalizeScopeUrl(change.scopeUrl);
    const types = await this.indexableTypes(scope);
    if (!types.includes(change.contentType)) {
      return { ok: true, action: "skip", message: `Type "${change.contentType}" is not indexed for ${scope}` };
    }

    const docId = documentId(scope, change.contentId);
    try {
      await this.writer.deleteByFilter(and(eq("site_url", scope), eq("document_id", docId)));
    } catch (err: unknown) {
      this.logger.error(`Failed to delete ${docId}`, { error: errorMessage(err) });
      return { ok: false, action: "error", message: errorMessage(err) };
    }

    if (!allowedStatuses([change.contentType]).includes(change.newStatus)) {
      return { ok: true, action: "deleted" };
    }

    const records = change.records.filter((r) => r.site_url === scope && r.document_id === docId);
    if (records.length < change.records.length) {
      this.logger.warn(`Dropped ${change.records.length - records.length} foreign record(s) for ${docId}`);
    }
    if (records.length === 0) {
      return { ok: true, action: "deleted", message: "No records to write" };
    }

    try {
      await this.writer.writeBatch(records);
    } catch (err: unknown) {
      this.logger.error(`Failed to write ${docId}`, { error: errorMessage(err) });
      return { ok: false, action: "error", message: errorMessage(err) };
    }
    return { ok: true, action: "upserted", count: records.length };
  }
}

// ── Watcher ───────────────────────────────────────────────────────────

interface ChangeWatcherBase {
  builder: RecordBuilder;
  indexableTypes: IndexableTypesLookup;
  logger?: Logger;
}

export type ChangeWatcherOptions =
  | (ChangeWatcherBase & { role: "governing"; applier: GoverningChangeApplier })
  | (ChangeWatcherBase & { role: "brand"; forward: ChangeForwarder });

export class ChangeWatcher {
  private readonly options: ChangeWatcherOptions;
  private readonly logger: Logger;

  constructor(options: ChangeWatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger();
  }

  async handle(event: ContentChangeEvent): Promise<ChangeResult> {
    const { builder } = this.options;
    const { item } = event;
    const scope = builder.siteUrl;

    const types = await this.options.indexableTypes(scope);
    if (!types.includes(item.type)) {
      return { ok: true, action: "skip", message: `Type "${item.type}" is not indexed for ${scope}` };
    }

    const records = allowedStatuses([item.type]).includes(event.newStatus) ? builder.buildRecords(item) : [];

    if (this.options.role === "governing") {
      return this.options.applier.apply({
        scopeUrl: scope,
        contentId: item.id,
        contentType: item.type,
        newStatus: event.newStatus,
        records,
      });
    }

    try {
      return await this.options.forward({
        site_url: scope,
        post_id: item.id,
        post_type: item.type,
        old_status: event.oldStatus,
        post_status: event.newStatus,
        records,
      });
    } catch (err: unknown) {
      this.logger.error(`Failed to forward change of ${item.type} ${item.id}`, { error: errorMessage(err) });
      return { ok: false, action: "error", message: errorMessage(err) };
    }
  }
}
