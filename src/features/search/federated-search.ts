/**
 * Federated search: scope resolution, query execution and document
 * reconstruction in one call.
 */
import type { FederatedSearchError } from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { ScopeResolver } from "./query-planner.js";
import type { SearchExecutor, SearchRequest } from "./search-executor.js";
import type { ReconstructOptions, ResultReconstructor } from "./result-reconstructor.js";
import type { SearchDocument } from "./search-document.js";

export interface FederatedSearchResult {
  query: string;
  documents: SearchDocument[];
  totalCount: number;
  page: number;
  perPage: number;
  /** Scopes the query ran against. */
  scopes: string[];
  error?: FederatedSearchError;
}

export interface FederatedSearchOptions {
  resolver: ScopeResolver;
  executor: SearchExecutor;
  reconstructor: ResultReconstructor;
  logger?: Logger;
}

export class FederatedSearch {
  private readonly resolver: ScopeResolver;
  private readonly executor: SearchExecutor;
  private readonly reconstructor: ResultReconstructor;
  private readonly logger: Logger;

  constructor(options: FederatedSearchOptions) {
    this.resolver = options.resolver;
    this.executor = options.executor;
    this.reconstructor = options.reconstructor;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Whether this site may search at all. */
  async isEnabled(): Promise<boolean> {
    return (await this.resolver.resolveSearchableScopes()).length > 0;
  }

  async search(request: SearchRequest, options: ReconstructOptions = {}): Promise<FederatedSearchResult> {
    const scopes = await this.resolver.resolveSearchableScopes();
    const executed = await this.executor.execute(request, scopes);
    const documents = executed.error ? [] : await this.reconstructor.reconstruct(executed.hits, options);

    if (documents.length < executed.hits.length) {
      this.logger.warn(`Dropped ${executed.hits.length - documents.length} hit(s) without a local item`);
    }

    return {
      query: request.query,
      documents,
      totalCount: executed.totalCount,
      page: executed.page,
      perPage: executed.perPage,
      scopes,
      error: executed.error,
    };
  }
}
