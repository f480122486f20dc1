import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { buildIndex, CorpusIndex, isIndexable } from '../src/pipeline/corpus';
import { TranscriptStore } from '../src/pipeline/store';
import { FakeEmbedder, makeTmpDir, vtt } from './helpers';

describe('isIndexable', () => {
  it('drops cues shorter than three characters', () => {
    const cue = (text: string) => ({ videoId: 'v', startSec: 0, endSec: 1, timestamp: '00:00:00.000', text });
    expect(isIndexable(cue('Ok'))).toBe(false);
    expect(isIndexable(cue('Ναι'))).toBe(true);
    expect(isIndexable(cue(''))).toBe(false);
  });
});

describe('buildIndex', () => {
  let dir: string;
  let store: TranscriptStore;

  beforeEach(async () => {
    dir = await makeTmpDir();
    store = new TranscriptStore(path.join(dir, 'subs'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the empty corpus for a missing store without embedding', async () => {
    const embedder = new FakeEmbedder();
    const corpus = await buildIndex(store, embedder);
    expect(corpus.cues).toEqual([]);
    expect(corpus.embeddings).toEqual([]);
    expect(corpus.model).toBe('test-model');
    expect(embedder.calls).toEqual([]);
  });

  it('embeds every usable cue in a single batch', async () => {
    await fs.outputFile(
      store.pathFor('vid001', 'el'),
      vtt(['00:00:01.000', '00:00:02.000', 'Ah'], ['00:00:03.000', '00:00:05.000', 'first real line'])
    );
    await fs.outputFile(store.pathFor('vid002', 'el'), vtt(['00:00:07.000', '00:00:09.000', 'second video']));
    const embedder = new FakeEmbedder();
    const corpus = await buildIndex(store, embedder);

    expect(embedder.calls).toHaveLength(1);
    expect([...embedder.calls[0]].sort()).toEqual(['first real line', 'second video']);
    expect(corpus.cues).toHaveLength(2);
    expect(corpus.embeddings).toHaveLength(2);
    const byVideo = Object.fromEntries(corpus.cues.map((c) => [c.videoId, c.text]));
    expect(byVideo).toEqual({ vid001: 'first real line', vid002: 'second video' });
  });

  it('indexes auto-generated captions with blank-looking lines inside cues', async () => {
    await fs.outputFile(
      store.pathFor('auto01', 'en'),
      'WEBVTT\nKind: captions\n\n00:00:00.030 --> 00:00:02.750 align:start position:0%\n \nhello<00:00:00.480><c> world</c>\n'
    );
    const corpus = await buildIndex(store, new FakeEmbedder());
    expect(corpus.cues.map((c) => c.text)).toEqual(['hello world']);
  });

  it('skips a malformed file and indexes the rest', async () => {
    await fs.outputFile(store.pathFor('bad001', 'el'), 'not a transcript at all');
    await fs.outputFile(store.pathFor('good01', 'el'), vtt(['00:00:01.000', '00:00:02.000', 'still indexed']));
    const corpus = await buildIndex(store, new FakeEmbedder());
    expect(corpus.cues.map((c) => c.videoId)).toEqual(['good01']);
  });

  it('returns the empty corpus when no cue survives filtering', async () => {
    await fs.outputFile(store.pathFor('vid001', 'el'), vtt(['00:00:01.000', '00:00:02.000', 'Ok']));
    const embedder = new FakeEmbedder();
    const corpus = await buildIndex(store, embedder);
    expect(corpus.cues).toEqual([]);
    expect(embedder.calls).toEqual([]);
  });
});

describe('CorpusIndex', () => {
  let dir: string;
  let store: TranscriptStore;

  beforeEach(async () => {
    dir = await makeTmpDir();
    store = new TranscriptStore(path.join(dir, 'subs'));
    await fs.outputFile(store.pathFor('vid001', 'el'), vtt(['00:00:01.000', '00:00:02.000', 'hello there']));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('builds once and serves the cached snapshot', async () => {
    const embedder = new FakeEmbedder();
    const index = new CorpusIndex(store, embedder);
    expect(index.current).toBeNull();
    const [a, b] = await Promise.all([index.get(), index.get()]);
    expect(a).toBe(b);
    expect(await index.get()).toBe(a);
    expect(embedder.calls).toHaveLength(1);
  });

  it('picks up new transcripts only on reload', async () => {
    const embedder = new FakeEmbedder();
    const index = new CorpusIndex(store, embedder);
    await index.get();
    await fs.outputFile(store.pathFor('vid002', 'el'), vtt(['00:00:03.000', '00:00:04.000', 'new arrival']));
    expect((await index.get()).cues).toHaveLength(1);
    const reloaded = await index.reload();
    expect(reloaded.cues).toHaveLength(2);
    expect(index.current).toBe(reloaded);
  });

  it('keeps the previous snapshot when a reload fails', async () => {
    const embedder = new FakeEmbedder();
    const index = new CorpusIndex(store, embedder);
    const first = await index.get();
    embedder.embed = async () => {
      throw new Error('runner down');
    };
    await expect(index.reload()).rejects.toThrow('runner down');
    expect(index.current).toBe(first);
  });
});
