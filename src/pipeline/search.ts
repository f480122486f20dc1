import type { Embedder } from './embed';
import { ENV } from './env';
import { EmbeddingError, EmbeddingModelMismatchError } from './errors';
import { watchUrl } from './ids';
import { debug } from './log';
import type { Corpus, SearchHit, SearchResponse, Vector } from './types';

/** Unrelated cues still score above zero; anything under this is not a match. */
export const RELEVANCE_FLOOR = 0.25;
/** Playback starts this many seconds before the cue. */
export const REWIND_SEC = 2;
export const DEFAULT_TOP_K = 10;

export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0, na = 0, nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export function seekOffset(startSec: number, rewindSec = REWIND_SEC): number {
  return Math.max(0, Math.floor(startSec) - rewindSec);
}

export interface RankedIndex {
  index: number;
  score: number;
}

/** Top `k` corpus positions by clamped cosine score, best first, ties in corpus order. */
export function topKByEmbedding(query: Vector, embeddings: Vector[], k: number): RankedIndex[] {
  const limit = Math.max(0, Math.floor(k));
  if (limit === 0) return [];
  const scored = embeddings.map((e, index) => ({ index, score: clampScore(cosineSimilarity(query, e)) }));
  scored.sort((x, y) => y.score - x.score || x.index - y.index);
  return scored.slice(0, limit);
}

export interface SearchOptions {
  minScore?: number;
  platformBaseUrl?: string;
}

/**
 * Ranks corpus cues against `query`. Read-only over the given snapshot.
 */
export async function search(
  corpus: Corpus,
  embedder: Embedder,
  query: string,
  topK = DEFAULT_TOP_K,
  opts: SearchOptions = {}
): Promise<SearchResponse> {
  if (corpus.cues.length === 0) {
    return { status: 'unavailable', reason: 'No transcripts indexed. Acquire some videos first.' };
  }
  if (embedder.model !== corpus.model) {
    throw new EmbeddingModelMismatchError(corpus.model, embedder.model);
  }
  const q = query.trim();
  if (!q) return { status: 'ok', hits: [] };

  const [vector] = await embedder.embed([q]);
  if (!vector) throw new EmbeddingError('Embedder returned no vector for the query');

  const minScore = opts.minScore ?? RELEVANCE_FLOOR;
  const baseUrl = opts.platformBaseUrl ?? ENV.platformBaseUrl;
  const ranked = topKByEmbedding(vector, corpus.embeddings, topK);
  const hits: SearchHit[] = [];
  for (const { index, score } of ranked) {
    if (score < minScore) continue;
    const cue = corpus.cues[index];
    const seekSec = seekOffset(cue.startSec);
    hits.push({ cue, corpusIndex: index, score, seekSec, watchUrl: watchUrl(cue.videoId, seekSec, baseUrl) });
  }
  debug('search.done', { query: q, candidates: ranked.length, hits: hits.length });
  return { status: 'ok', hits };
}
