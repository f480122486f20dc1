import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { ClipDownloadError, ClipEncodeError, PipelineError } from './errors';
import { escapeFilterPath, resolveFontFile, type Encoder } from './ffmpeg';
import { describeFailure } from './guards';
import { toVideoUrl } from './ids';
import { KeyedMutex } from './lock';
import { info, startStep, warn } from './log';
import { purgeTempFiles } from './temp';
import type { ClipArtifact, ClipKey } from './types';
import type { MediaDownloader } from './ytdlp';

export const CAPTION_FILENAME_CHARS = 20;

export interface CaptionStyle {
  fps: number;
  width: number;
  fontSize: number;
  fontColor: string;
  boxColor: string;
  boxBorder: number;
  marginBottom: number;
}

export const DEFAULT_STYLE: CaptionStyle = {
  fps: 12,
  width: 480,
  fontSize: 24,
  fontColor: 'white',
  boxColor: 'black@0.5',
  boxBorder: 5,
  marginBottom: 10,
};

/** Letters, digits and spaces only, cut to a filename-sized prefix, spaces as `_`. */
export function sanitizeCaptionForFilename(caption: string, maxChars = CAPTION_FILENAME_CHARS): string {
  const kept = [...caption].filter((ch) => /[\p{L}\p{N} ]/u.test(ch)).join('').trim();
  return [...kept].slice(0, maxChars).join('').replace(/ /g, '_');
}

/**
 * Caption as it may appear between single quotes in a drawtext option:
 * quotes, colons and backslashes would end the value or split the option
 * list, so they are removed.
 */
export function sanitizeFilterText(caption: string): string {
  return caption.replace(/['"`:\\]/g, '').replace(/\s+/g, ' ').trim();
}

export function clipKey(videoId: string, startSeconds: number, caption: string): ClipKey {
  return { videoId, second: Math.floor(startSeconds), caption: sanitizeCaptionForFilename(caption) };
}

export function clipFileName(key: ClipKey): string {
  return `${key.videoId}_${key.second}_${key.caption}.gif`;
}

export function buildFilterGraph(caption: string, fontFile: string | null, style: CaptionStyle = DEFAULT_STYLE): string {
  const font = fontFile ? escapeFilterPath(fontFile) : null;
  const drawtext = [
    ...(font ? [`fontfile='${font}'`] : []),
    `text='${sanitizeFilterText(caption)}'`,
    'expansion=none',
    `fontcolor=${style.fontColor}`,
    `fontsize=${style.fontSize}`,
    'box=1',
    `boxcolor=${style.boxColor}`,
    `boxborderw=${style.boxBorder}`,
    'x=(w-text_w)/2',
    `y=h-text_h-${style.marginBottom}`,
  ].join(':');
  return (
    `fps=${style.fps},scale=${style.width}:-1,` +
    `drawtext=${drawtext},` +
    `split[s0][s1];[s0]palettegen[p];[s1][p]paletteuse`
  );
}

export interface ClipOptions {
  clipsDir: string;
  /** Length of the downloaded window. */
  durationSec: number;
  maxHeight: number;
  style: CaptionStyle;
  /** Preferred font file, checked before the system font list. */
  configuredFont: string;
  /** Skips the lookup entirely; null renders without `fontfile`. */
  fontFile?: string | null;
  platformBaseUrl: string;
}

const VIDEO_ID_RE = /^[A-Za-z0-9_-]+$/;

export class ClipSynthesizer {
  readonly clipsDir: string;
  private opts: ClipOptions;
  private locks = new KeyedMutex();
  private font: Promise<string | null> | null = null;

  constructor(
    private downloader: MediaDownloader,
    private encoder: Encoder,
    opts: Partial<ClipOptions> = {}
  ) {
    this.opts = {
      clipsDir: ENV.clipsDir,
      durationSec: 4,
      maxHeight: 480,
      style: DEFAULT_STYLE,
      configuredFont: ENV.fontFile,
      platformBaseUrl: ENV.platformBaseUrl,
      ...opts,
    };
    this.clipsDir = path.resolve(this.opts.clipsDir);
  }

  pathFor(key: ClipKey): string {
    return path.join(this.clipsDir, clipFileName(key));
  }

  private fontFile(): Promise<string | null> {
    if (this.opts.fontFile !== undefined) return Promise.resolve(this.opts.fontFile);
    if (!this.font) this.font = resolveFontFile(this.opts.configuredFont);
    return this.font;
  }

  /** Removes leftover working files of `videoId` from the clips directory. */
  async purgeTemp(videoId: string): Promise<string[]> {
    return purgeTempFiles(this.clipsDir, videoId);
  }

  async synthesize(videoId: string, startSeconds: number, caption: string): Promise<ClipArtifact> {
    if (!VIDEO_ID_RE.test(videoId)) {
      throw new PipelineError(`Invalid video id "${videoId}"`, 'invalid_clip_request', { videoId });
    }
    if (!Number.isFinite(startSeconds) || startSeconds < 0) {
      throw new PipelineError(`Invalid start offset ${startSeconds}`, 'invalid_clip_request', { videoId, startSeconds });
    }
    const key = clipKey(videoId, startSeconds, caption);
    const output = this.pathFor(key);
    if (await fs.pathExists(output)) {
      info('clip.cache.hit', { path: output });
      return { path: output, key, cached: true };
    }

    // temp files are named by video id, so renders of one video take turns
    return this.locks.runExclusive(videoId, async () => {
      if (await fs.pathExists(output)) {
        info('clip.cache.hit', { path: output });
        return { path: output, key, cached: true };
      }
      await fs.ensureDir(this.clipsDir);
      const purged = await this.purgeTemp(videoId);
      if (purged.length) warn('clip.temp.purged', { videoId, files: purged });

      const timer = startStep('clip.render', { videoId, second: key.second });
      const tempVideo = path.join(this.clipsDir, `temp_${videoId}.mp4`);
      const partial = path.join(this.clipsDir, `temp_${videoId}_${key.second}.gif`);
      try {
        try {
          await this.downloader.downloadSection(
            toVideoUrl(videoId, this.opts.platformBaseUrl),
            path.join(this.clipsDir, `temp_${videoId}.%(ext)s`),
            { startSec: startSeconds, endSec: startSeconds + this.opts.durationSec },
            this.opts.maxHeight
          );
        } catch (e: unknown) {
          throw new ClipDownloadError(`Download failed: ${describeFailure(e)}`, videoId);
        }
        if (!(await fs.pathExists(tempVideo))) {
          throw new ClipDownloadError('Download produced no media file', videoId);
        }

        const graph = buildFilterGraph(caption, await this.fontFile(), this.opts.style);
        try {
          await this.encoder.render(tempVideo, graph, partial);
        } catch (e: unknown) {
          throw new ClipEncodeError(`Encoding failed: ${describeFailure(e)}`, videoId);
        }
        if (!(await fs.pathExists(partial))) {
          throw new ClipEncodeError('Encoder produced no output', videoId);
        }
        await fs.move(partial, output, { overwrite: true });
        timer.end();
        info('clip.ready', { path: output });
        return { path: output, key, cached: false };
      } finally {
        await this.purgeTemp(videoId);
      }
    });
  }
}
