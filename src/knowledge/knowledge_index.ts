/**
 * @fileoverview In-memory knowledge index
 *
 * Documents are chunked, embedded and stored per document id. A document's new
 * chunk set is fully built before it replaces the old one in a single map
 * assignment, so readers see either the previous or the new version of a
 * document, never a mix. Readers work on frozen snapshots that later writes
 * do not touch.
 *
 * @packageDocumentation
 */

import { EmbeddingError, IndexCorruptionError, isIndexCorruptionError, getErrorMessage } from '../core/errors.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { compareIds } from '../utils/compare.js';
import { chunkText, type ChunkingOptions } from './chunker.js';
import type { EmbeddingFunction } from './embeddings.js';

// ============================================================================
// TYPES
// ============================================================================

export interface KnowledgeChunk {
  readonly sourceId: string;
  readonly sequenceIndex: number;
  readonly text: string;
  readonly embedding: readonly number[];
  /** ISO-8601 */
  readonly lastIndexedAt: string;
}

export interface IndexSnapshot {
  readonly embeddingVersion: string;
  readonly documentCount: number;
  /** Ordered by sourceId, then sequenceIndex. */
  readonly chunks: readonly KnowledgeChunk[];
}

/** One document as reported by a SourceLister. */
export interface SourceDocument {
  readonly id: string;
  /** Changes whenever the content may have changed (e.g. mtime and size). */
  readonly fingerprint: string;
  load(): Promise<string>;
}

export interface SourceLister {
  list(): Promise<SourceDocument[]>;
}

export interface RefreshFailure {
  documentId: string;
  error: string;
}

export interface RefreshReport {
  added: string[];
  updated: string[];
  removed: string[];
  unchanged: string[];
  failed: RefreshFailure[];
  /** True when the cycle was cancelled before it finished. */
  aborted: boolean;
  startedAt: string;
  completedAt: string;
}

export interface KnowledgeIndexStats {
  documents: number;
  chunks: number;
  embeddingVersion: string;
  lastRefreshAt: string | null;
  lastSuccessfulRefreshAt: string | null;
}

export interface KnowledgeIndexOptions extends ChunkingOptions {
  embedder: EmbeddingFunction;
  now?: () => Date;
}

export interface IngestOptions {
  /** Set when the document comes from a SourceLister; refresh then owns it. */
  fingerprint?: string;
}

export interface RefreshOptions {
  signal?: AbortSignal;
}

/** `direct` documents were ingested by id and survive refresh cycles. */
type DocumentOrigin =
  | { readonly kind: 'source'; readonly fingerprint: string }
  | { readonly kind: 'direct' };

interface DocumentEntry {
  readonly origin: DocumentOrigin;
  readonly chunks: readonly KnowledgeChunk[];
}

// ============================================================================
// INDEX
// ============================================================================

export class KnowledgeIndex {
  private version: string;
  private readonly embedder: EmbeddingFunction;
  private readonly chunking: ChunkingOptions;
  private readonly now: () => Date;
  private documents = new Map<string, DocumentEntry>();
  private cachedSnapshot: IndexSnapshot | null = null;
  private refreshQueue: Promise<void> = Promise.resolve();
  private lastRefreshAt: string | null = null;
  private lastSuccessfulRefreshAt: string | null = null;

  constructor(options: KnowledgeIndexOptions) {
    this.embedder = options.embedder;
    this.version = options.embedder.version;
    this.chunking = { chunkSize: options.chunkSize, overlap: options.overlap };
    this.now = options.now ?? (() => new Date());
  }

  /** Version every stored vector was computed with. */
  get embeddingVersion(): string {
    return this.version;
  }

  /**
   * Replace every chunk of `documentId` with chunks of `text`.
   * Returns the number of chunks now stored for the document.
   */
  async ingest(documentId: string, text: string, options: IngestOptions = {}): Promise<number> {
    const chunks = await this.buildChunks(documentId, text);
    const origin: DocumentOrigin = options.fingerprint === undefined
      ? { kind: 'direct' }
      : { kind: 'source', fingerprint: options.fingerprint };
    this.documents.set(documentId, { origin, chunks });
    this.cachedSnapshot = null;
    logDebug('Ingested document', { documentId, chunks: chunks.length });
    return chunks.length;
  }

  /** Idempotent; returns whether the document was present. */
  remove(documentId: string): boolean {
    const removed = this.documents.delete(documentId);
    if (removed) {
      this.cachedSnapshot = null;
    }
    return removed;
  }

  has(documentId: string): boolean {
    return this.documents.has(documentId);
  }

  documentIds(): string[] {
    return [...this.documents.keys()].sort(compareIds);
  }

  /** Chunks of one document, in sequence order. */
  chunksFor(documentId: string): readonly KnowledgeChunk[] {
    return this.documents.get(documentId)?.chunks ?? [];
  }

  snapshot(): IndexSnapshot {
    if (this.cachedSnapshot) return this.cachedSnapshot;
    const chunks: KnowledgeChunk[] = [];
    for (const id of this.documentIds()) {
      const entry = this.documents.get(id);
      if (entry) chunks.push(...entry.chunks);
    }
    this.cachedSnapshot = Object.freeze({
      embeddingVersion: this.embeddingVersion,
      documentCount: this.documents.size,
      chunks: Object.freeze(chunks),
    });
    return this.cachedSnapshot;
  }

  stats(): KnowledgeIndexStats {
    const snapshot = this.snapshot();
    return {
      documents: snapshot.documentCount,
      chunks: snapshot.chunks.length,
      embeddingVersion: this.embeddingVersion,
      lastRefreshAt: this.lastRefreshAt,
      lastSuccessfulRefreshAt: this.lastSuccessfulRefreshAt,
    };
  }

  /**
   * Bring the index in line with `lister`: ingest new and changed documents,
   * drop vanished ones, leave unchanged ones untouched. Calls are serialized.
   */
  refreshFromSource(lister: SourceLister, options: RefreshOptions = {}): Promise<RefreshReport> {
    const run = this.refreshQueue.then(() => this.runRefresh(lister, options));
    this.refreshQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Drop everything and re-ingest from `lister`, adopting the embedder's
   * current version. This is the recovery path after an IndexCorruptionError.
   */
  rebuild(lister: SourceLister, options: RefreshOptions = {}): Promise<RefreshReport> {
    const run = this.refreshQueue.then(() => {
      this.documents = new Map();
      this.cachedSnapshot = null;
      this.version = this.embedder.version;
      logInfo('Rebuilding knowledge index', { embeddingVersion: this.embeddingVersion });
      return this.runRefresh(lister, options);
    });
    this.refreshQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async buildChunks(documentId: string, text: string): Promise<KnowledgeChunk[]> {
    if (this.embedder.version !== this.embeddingVersion) {
      throw new IndexCorruptionError(this.embeddingVersion, this.embedder.version, `ingest of ${documentId}`);
    }
    const pieces = chunkText(text, this.chunking);
    if (pieces.length === 0) return [];

    const vectors = await this.embedder.embed(pieces.map((piece) => piece.text));
    if (vectors.length !== pieces.length) {
      throw new EmbeddingError(
        this.embeddingVersion,
        false,
        `expected ${pieces.length} vectors for ${documentId}, got ${vectors.length}`,
      );
    }

    const indexedAt = this.now().toISOString();
    return pieces.map((piece, i) => {
      const embedding = vectors[i];
      if (embedding.length !== this.embedder.dimension) {
        throw new EmbeddingError(
          this.embeddingVersion,
          false,
          `vector ${i} of ${documentId} has dimension ${embedding.length}, expected ${this.embedder.dimension}`,
          piece.text.length,
        );
      }
      return Object.freeze({
        sourceId: documentId,
        sequenceIndex: piece.sequenceIndex,
        text: piece.text,
        embedding: Object.freeze([...embedding]),
        lastIndexedAt: indexedAt,
      });
    });
  }

  private async runRefresh(lister: SourceLister, options: RefreshOptions): Promise<RefreshReport> {
    const startedAt = this.now().toISOString();
    const report: RefreshReport = {
      added: [],
      updated: [],
      removed: [],
      unchanged: [],
      failed: [],
      aborted: false,
      startedAt,
      completedAt: startedAt,
    };

    let documents: SourceDocument[];
    try {
      documents = await lister.list();
    } catch (error) {
      this.lastRefreshAt = this.now().toISOString();
      throw error;
    }

    const seen = new Set<string>();
    const ordered = [...documents].sort((a, b) => compareIds(a.id, b.id));
    for (const document of ordered) {
      if (options.signal?.aborted) {
        report.aborted = true;
        break;
      }
      if (seen.has(document.id)) {
        logWarning('Duplicate document id from source, keeping the first', { documentId: document.id });
        continue;
      }
      seen.add(document.id);

      const existing = this.documents.get(document.id);
      if (existing?.origin.kind === 'source' && existing.origin.fingerprint === document.fingerprint) {
        report.unchanged.push(document.id);
        continue;
      }

      try {
        const text = await document.load();
        await this.ingest(document.id, text, { fingerprint: document.fingerprint });
        (existing ? report.updated : report.added).push(document.id);
      } catch (error) {
        if (isIndexCorruptionError(error)) throw error;
        const message = getErrorMessage(error);
        logWarning('Skipping document that failed to index', { documentId: document.id, error: message });
        report.failed.push({ documentId: document.id, error: message });
      }
    }

    if (!report.aborted) {
      for (const id of this.documentIds()) {
        if (seen.has(id) || this.documents.get(id)?.origin.kind !== 'source') continue;
        if (this.remove(id)) {
          report.removed.push(id);
        }
      }
    }

    const completedAt = this.now().toISOString();
    report.completedAt = completedAt;
    this.lastRefreshAt = completedAt;
    if (!report.aborted) {
      this.lastSuccessfulRefreshAt = completedAt;
    }

    if (report.added.length + report.updated.length + report.removed.length + report.failed.length > 0) {
      logInfo('Knowledge index refreshed', {
        added: report.added.length,
        updated: report.updated.length,
        removed: report.removed.length,
        failed: report.failed.length,
      });
    }
    return report;
  }
}
