import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { Embedder } from '../src/pipeline/embed';
import type { Encoder } from '../src/pipeline/ffmpeg';
import type { TranscribeOptions, Transcriber } from '../src/pipeline/transcribe';
import type { ResolvedSource, Segment, TimeRange, Vector } from '../src/pipeline/types';
import type { MediaDownloader } from '../src/pipeline/ytdlp';

export async function makeTmpDir(prefix = 'clipfinder-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function vtt(...cues: Array<[string, string, string]>): string {
  return 'WEBVTT\n\n' + cues.map(([s, e, t]) => `${s} --> ${e}\n${t}\n`).join('\n');
}

function fill(template: string, ext: string): string {
  return template.replace('%(ext)s', ext);
}

/** Downloader whose effects are files written per video id; every call is recorded. */
export class FakeDownloader implements MediaDownloader {
  calls: Array<{ method: string; url: string; outTemplate?: string; range?: TimeRange }> = [];
  resolved: ResolvedSource | Error = { kind: 'video', entry: { id: 'vid001', url: 'https://example.test/watch?v=vid001' } };
  /** Videos with platform subtitles, and their content. */
  subtitles = new Map<string, string>();
  /** Videos whose audio download throws. */
  audioFailures = new Set<string>();
  /** Videos whose section download throws. */
  sectionFailures = new Set<string>();
  /** When false, audio downloads succeed without writing a file. */
  writeAudio = true;
  /** When false, section downloads succeed without writing a file. */
  writeSections = true;

  async resolve(url: string): Promise<ResolvedSource> {
    this.calls.push({ method: 'resolve', url });
    if (this.resolved instanceof Error) throw this.resolved;
    return this.resolved;
  }

  async fetchSubtitles(videoUrl: string, outTemplate: string, language: string): Promise<void> {
    this.calls.push({ method: 'fetchSubtitles', url: videoUrl, outTemplate });
    const id = path.basename(outTemplate);
    const content = this.subtitles.get(id);
    if (content !== undefined) await fs.outputFile(`${outTemplate}.${language}.vtt`, content);
  }

  async downloadAudio(videoUrl: string, outTemplate: string): Promise<void> {
    this.calls.push({ method: 'downloadAudio', url: videoUrl, outTemplate });
    const id = path.basename(outTemplate).replace(/^temp_/, '').replace('.%(ext)s', '');
    if (this.audioFailures.has(id)) throw new Error('HTTP Error 403: Forbidden');
    if (this.writeAudio) await fs.outputFile(fill(outTemplate, 'mp3'), 'audio');
  }

  async downloadSection(videoUrl: string, outTemplate: string, range: TimeRange): Promise<void> {
    this.calls.push({ method: 'downloadSection', url: videoUrl, outTemplate, range });
    const id = path.basename(outTemplate).replace(/^temp_/, '').replace('.%(ext)s', '');
    if (this.sectionFailures.has(id)) throw new Error('Video unavailable');
    if (this.writeSections) await fs.outputFile(fill(outTemplate, 'mp4'), 'video');
  }

  count(method: string): number {
    return this.calls.filter((c) => c.method === method).length;
  }
}

export class FakeTranscriber implements Transcriber {
  calls: Array<{ audioPath: string; opts: TranscribeOptions }> = [];
  segments: Segment[] = [{ startSec: 0, endSec: 2.5, text: 'generated line' }];
  failAfter: number | null = null;

  async *transcribe(audioPath: string, opts: TranscribeOptions): AsyncIterable<Segment> {
    this.calls.push({ audioPath, opts });
    for (const [i, seg] of this.segments.entries()) {
      if (this.failAfter !== null && i >= this.failAfter) throw new Error('model crashed');
      yield seg;
    }
    if (this.failAfter !== null && this.failAfter >= this.segments.length) throw new Error('model crashed');
  }
}

/** Looks vectors up by exact text; unknown texts map to `fallback`. */
export class FakeEmbedder implements Embedder {
  calls: string[][] = [];

  constructor(
    private vectors: Record<string, Vector> = {},
    readonly model = 'test-model',
    private fallback: Vector = [0, 0, 1]
  ) {}

  async embed(texts: string[]): Promise<Vector[]> {
    this.calls.push(texts);
    return texts.map((t) => this.vectors[t] ?? this.fallback);
  }
}

export class FakeEncoder implements Encoder {
  calls: Array<{ input: string; filterGraph: string; output: string }> = [];
  fail = false;
  writeOutput = true;

  async render(input: string, filterGraph: string, output: string): Promise<void> {
    this.calls.push({ input, filterGraph, output });
    if (this.fail) throw new Error('Invalid argument');
    if (this.writeOutput) await fs.outputFile(output, 'GIF89a');
  }
}
