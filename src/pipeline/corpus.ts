import type { Embedder } from './embed';
import { errorMessage, info, startStep, warn } from './log';
import type { TranscriptStore } from './store';
import type { Corpus, Cue } from './types';

/** Shorter cues ("Ah", "Ok") are left out of the corpus. */
export const MIN_CUE_CHARS = 3;

export function isIndexable(cue: Cue): boolean {
  return [...cue.text].length >= MIN_CUE_CHARS;
}

export function emptyCorpus(model: string): Corpus {
  return { model, cues: [], embeddings: [], builtAt: new Date().toISOString() };
}

/**
 * Reads every transcript in the store and embeds all indexable cues in one
 * batch. Unparseable files are skipped; a missing or empty store yields the
 * empty corpus without calling the embedder.
 */
export async function buildIndex(store: TranscriptStore, embedder: Embedder): Promise<Corpus> {
  const files = await store.list();
  if (files.length === 0) {
    warn('index.empty', { dir: store.dir, reason: (await store.exists()) ? 'no transcripts' : 'missing store' });
    return emptyCorpus(embedder.model);
  }

  const timer = startStep('index.build', { files: files.length });
  const cues: Cue[] = [];
  let skippedFiles = 0;
  for (const [i, file] of files.entries()) {
    try {
      const parsed = await store.read(file);
      cues.push(...parsed.filter(isIndexable));
    } catch (e: unknown) {
      skippedFiles++;
      warn('index.file.skip', { file: file.path, error: errorMessage(e) });
    }
    timer.eta(i + 1, files.length);
  }

  if (cues.length === 0) {
    timer.end();
    warn('index.empty', { dir: store.dir, reason: 'no usable cues', skippedFiles });
    return emptyCorpus(embedder.model);
  }

  const embeddings = await embedder.embed(cues.map((c) => c.text));
  if (embeddings.length !== cues.length) {
    throw new Error(`Embedder returned ${embeddings.length} vectors for ${cues.length} cues`);
  }
  timer.end();
  info('index.ready', { files: files.length, skippedFiles, cues: cues.length, model: embedder.model });
  return { model: embedder.model, cues, embeddings, builtAt: new Date().toISOString() };
}

/**
 * Process-wide corpus snapshot. Built on first use, replaced only by an
 * explicit reload; a failed reload keeps the previous snapshot.
 */
export class CorpusIndex {
  private snapshot: Corpus | null = null;
  private building: Promise<Corpus> | null = null;

  constructor(
    private store: TranscriptStore,
    private embedder: Embedder
  ) {}

  get current(): Corpus | null {
    return this.snapshot;
  }

  async get(): Promise<Corpus> {
    if (this.snapshot) return this.snapshot;
    return this.rebuild();
  }

  async reload(): Promise<Corpus> {
    return this.rebuild();
  }

  private rebuild(): Promise<Corpus> {
    if (this.building) return this.building;
    this.building = buildIndex(this.store, this.embedder)
      .then((corpus) => {
        this.snapshot = corpus;
        return corpus;
      })
      .finally(() => {
        this.building = null;
      });
    return this.building;
  }
}
