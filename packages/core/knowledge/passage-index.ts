/**
 * PASSAGE INDEX
 *
 * Built once at process start; read-only afterwards, so concurrent
 * retrievals need no locking.
 *
 * Ranking is cosine similarity between the query (checkpoint label plus
 * facility attributes) and each passage, restricted to passages tagged for
 * the checkpoint type and station. Ties break on passage id, so identical
 * index state and query always give the same order.
 */

import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { CHECKPOINT_LABELS } from "../trip/types";
import { withTimeout } from "../utils/timeout";
import { dot, LexicalEmbedder, type Embedder } from "./embedder";
import type { GuidancePassage, RetrievalOutcome, RetrievalQuery, ScoredPassage } from "./types";

interface IndexedPassage {
  passage: GuidancePassage;
  vector: number[];
}

export interface PassageIndexOptions {
  /** Tried first; the lexical embedder is used when it is absent or fails */
  primary?: Embedder;
  fallback?: Embedder;
  logger?: Logger;
}

export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 1500;

export class PassageIndex {
  private constructor(
    private readonly entries: readonly IndexedPassage[],
    private readonly embedder: Embedder,
    private readonly logger: Logger
  ) {}

  static async build(
    passages: readonly GuidancePassage[],
    options: PassageIndexOptions = {}
  ): Promise<PassageIndex> {
    const logger = options.logger ?? silentLogger;
    const fallback = options.fallback ?? new LexicalEmbedder();
    const texts = passages.map(indexText);

    if (options.primary) {
      try {
        const vectors = await options.primary.embedDocuments(texts);
        logger.info(`Indexed ${passages.length} passages with ${options.primary.name}`);
        return new PassageIndex(zip(passages, vectors), options.primary, logger);
      } catch (error) {
        logger.warn(`${options.primary.name} embedding failed, using ${fallback.name}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const vectors = await fallback.embedDocuments(texts);
    logger.info(`Indexed ${passages.length} passages with ${fallback.name}`);
    return new PassageIndex(zip(passages, vectors), fallback, logger);
  }

  get size(): number {
    return this.entries.length;
  }

  get embedderName(): string {
    return this.embedder.name;
  }

  async retrieve(
    query: RetrievalQuery,
    k: number,
    timeoutMs: number = DEFAULT_RETRIEVAL_TIMEOUT_MS
  ): Promise<RetrievalOutcome> {
    const candidates = this.entries.filter((entry) => matches(entry.passage, query));
    if (k <= 0 || candidates.length === 0) return { status: "ok", passages: [] };

    const queryText = `${CHECKPOINT_LABELS[query.checkpointType]} ${query.context}`;
    const embedded = await withTimeout((signal) => this.embedder.embedQuery(queryText, signal), timeoutMs);

    switch (embedded.status) {
      case "timeout":
        this.logger.warn(`Retrieval timed out after ${timeoutMs}ms`);
        return { status: "unavailable", reason: `timed out after ${timeoutMs}ms`, passages: [] };
      case "error":
        this.logger.warn("Retrieval failed", { error: embedded.error.message });
        return { status: "unavailable", reason: embedded.error.message, passages: [] };
      case "ok":
        break;
    }

    const scored: ScoredPassage[] = candidates
      .map((entry) => ({ passage: entry.passage, score: dot(embedded.value, entry.vector) }))
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || a.passage.id.localeCompare(b.passage.id));

    return { status: "ok", passages: scored.slice(0, k) };
  }
}

function indexText(passage: GuidancePassage): string {
  return [passage.text, ...passage.tags].join(" ");
}

function zip(passages: readonly GuidancePassage[], vectors: number[][]): IndexedPassage[] {
  if (vectors.length !== passages.length) {
    throw new Error(`Got ${vectors.length} vectors for ${passages.length} passages`);
  }
  return passages.map((passage, i) => ({ passage, vector: vectors[i] }));
}

function matches(passage: GuidancePassage, query: RetrievalQuery): boolean {
  if (passage.checkpointTypes.length > 0 && !passage.checkpointTypes.includes(query.checkpointType)) {
    return false;
  }
  if (passage.stations && passage.stations.length > 0) {
    return query.station !== undefined && passage.stations.includes(query.station);
  }
  return true;
}
