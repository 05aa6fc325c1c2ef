import { cosineDistance, count, desc, gte, isNotNull, sql, and } from 'drizzle-orm';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { DocumentIndexStatus, RetrievedPassage } from '@tonecraft/shared';
import type { Database } from '../db/index.js';
import { documentChunks } from '../db/schema.js';
import { untilAborted } from '../lib/outcome.js';

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/** Similarity search over ingested reference documents. */
export interface DocumentIndex {
  status(): Promise<DocumentIndexStatus>;
  retrieve(query: string, k: number, options?: RetrieveOptions): Promise<RetrievedPassage[]>;
  /** Forget a memoized ready status, e.g. after ingestion. */
  reload(): void;
}

export interface PgVectorDocumentIndexOptions {
  minSimilarity: number;
}

export class PgVectorDocumentIndex implements DocumentIndex {
  private ready: DocumentIndexStatus | null = null;
  private pending: Promise<DocumentIndexStatus> | null = null;
  // Bumped by reload() so a load started earlier cannot memoize a stale count
  private generation = 0;

  constructor(
    private readonly db: Database,
    private readonly embeddings: EmbeddingsInterface,
    private readonly options: PgVectorDocumentIndexOptions,
  ) {}

  async status(): Promise<DocumentIndexStatus> {
    if (this.ready) return this.ready;
    // Concurrent callers share one load
    if (!this.pending) {
      const pending = this.load(this.generation).finally(() => {
        if (this.pending === pending) this.pending = null;
      });
      this.pending = pending;
    }
    return this.pending;
  }

  reload(): void {
    this.generation += 1;
    this.ready = null;
    this.pending = null;
  }

  async retrieve(query: string, k: number, options?: RetrieveOptions): Promise<RetrievedPassage[]> {
    const signal = options?.signal;
    signal?.throwIfAborted();
    // Neither the embeddings client nor the driver takes a signal
    const queryEmbedding = await untilAborted(this.embeddings.embedQuery(query), signal);

    const similarity = sql<number>`1 - (${cosineDistance(documentChunks.embedding, queryEmbedding)})`;
    const rows = await untilAborted(
      this.db
        .select({ source: documentChunks.source, content: documentChunks.content, similarity })
        .from(documentChunks)
        .where(and(isNotNull(documentChunks.embedding), gte(similarity, this.options.minSimilarity)))
        .orderBy(desc(similarity))
        .limit(k)
        .execute(),
      signal,
    );

    return rows.map((row, i) => ({ source: row.source, content: row.content, rank: i + 1 }));
  }

  protected async countEmbedded(): Promise<number> {
    const [row] = await this.db
      .select({ count: count() })
      .from(documentChunks)
      .where(isNotNull(documentChunks.embedding));
    return row.count;
  }

  private async load(generation: number): Promise<DocumentIndexStatus> {
    const embedded = await this.countEmbedded();
    const status = { ready: embedded > 0, count: embedded };
    // Not-ready is re-checked on the next call
    if (status.ready && generation === this.generation) this.ready = status;
    console.log(`[RAG] Document index: ${status.count} embedded chunks`);
    return status;
  }
}
