import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { AcquisitionError } from './errors';
import { describeFailure } from './guards';
import { toVideoId } from './ids';
import { KeyedMutex } from './lock';
import { error, info, startStep, warn } from './log';
import type { TranscriptStore } from './store';
import { purgeTempFiles } from './temp';
import { primingPhraseFor, type Transcriber } from './transcribe';
import type { VideoEntry } from './types';
import type { MediaDownloader } from './ytdlp';

export type AcquisitionState =
    | 'CHECK_EXISTING'
    | 'FETCH_PLATFORM_SUBS'
    | 'GENERATE_VIA_TRANSCRIPTION'
    | 'DONE'
    | 'FAILED';

export type TranscriptSource = 'existing' | 'platform' | 'transcription';

export interface AcquisitionOutcome {
    videoId: string;
    title?: string;
    state: 'DONE' | 'FAILED';
    source: TranscriptSource | null;
    transcriptPath: string | null;
    error: AcquisitionError | null;
    /** States visited, in order, before the terminal one. */
    trail: AcquisitionState[];
}

export interface BatchSummary {
    url: string;
    title?: string;
    total: number;
    acquired: number;
    skipped: number;
    failed: number;
    outcomes: AcquisitionOutcome[];
    /** Set when the URL itself could not be resolved. */
    error?: AcquisitionError;
}

export interface AcquireOptions {
    language: string;
    initialPrompt?: string;
    beamSize: number;
    /** Directory for `temp_<videoId>.*` audio downloads. */
    tempDir: string;
}

type Step =
    | { next: 'CHECK_EXISTING' | 'FETCH_PLATFORM_SUBS' | 'GENERATE_VIA_TRANSCRIPTION' }
    | { next: 'DONE'; source: TranscriptSource; transcriptPath: string }
    | { next: 'FAILED'; error: AcquisitionError };

/**
 * Guarantees a transcript for each video: reuse what the store has, else the
 * platform's subtitles, else transcribe the audio.
 */
export class AcquisitionPipeline {
    private opts: AcquireOptions;
    private locks = new KeyedMutex();

    constructor(
        private store: TranscriptStore,
        private downloader: MediaDownloader,
        private transcriber: Transcriber,
        opts: Partial<AcquireOptions> = {}
    ) {
        const language = opts.language ?? ENV.language;
        this.opts = {
            language,
            initialPrompt: opts.initialPrompt ?? primingPhraseFor(language),
            beamSize: opts.beamSize ?? ENV.transcribeBeamSize,
            tempDir: path.resolve(opts.tempDir ?? ENV.tempDir),
        };
    }

    audioTemplate(videoId: string): string {
        return path.join(this.opts.tempDir, `temp_${videoId}.%(ext)s`);
    }

    audioPath(videoId: string): string {
        return path.join(this.opts.tempDir, `temp_${videoId}.mp3`);
    }

    async acquireVideo(entry: VideoEntry): Promise<AcquisitionOutcome> {
        return this.locks.runExclusive(entry.id, () => this.run(entry));
    }

    private async run(entry: VideoEntry): Promise<AcquisitionOutcome> {
        const trail: AcquisitionState[] = [];
        let step: Step = { next: 'CHECK_EXISTING' };
        while (step.next !== 'DONE' && step.next !== 'FAILED') {
            trail.push(step.next);
            step = await this.advance(step.next, entry);
        }
        const base = { videoId: entry.id, title: entry.title, trail };
        if (step.next === 'DONE') {
            return { ...base, state: 'DONE', source: step.source, transcriptPath: step.transcriptPath, error: null };
        }
        warn('acquire.video.failed', { videoId: entry.id, stage: step.error.stage, error: step.error.message });
        return { ...base, state: 'FAILED', source: null, transcriptPath: null, error: step.error };
    }

    private async advance(
        state: 'CHECK_EXISTING' | 'FETCH_PLATFORM_SUBS' | 'GENERATE_VIA_TRANSCRIPTION',
        entry: VideoEntry
    ): Promise<Step> {
        switch (state) {
            case 'CHECK_EXISTING':
                return this.checkExisting(entry);
            case 'FETCH_PLATFORM_SUBS':
                return this.fetchPlatformSubs(entry);
            case 'GENERATE_VIA_TRANSCRIPTION':
                return this.generate(entry);
        }
    }

    private async checkExisting(entry: VideoEntry): Promise<Step> {
        const existing = await this.store.find(entry.id);
        if (existing) {
            info('acquire.skip', { videoId: entry.id, title: entry.title, path: existing });
            return { next: 'DONE', source: 'existing', transcriptPath: existing };
        }
        info('acquire.video.start', { videoId: entry.id, title: entry.title });
        return { next: 'FETCH_PLATFORM_SUBS' };
    }

    private async fetchPlatformSubs(entry: VideoEntry): Promise<Step> {
        try {
            await fs.ensureDir(this.store.dir);
            await this.downloader.fetchSubtitles(entry.url, this.store.outputTemplate(entry.id), this.opts.language);
        } catch (e: unknown) {
            warn('acquire.subs.error', { videoId: entry.id, error: describeFailure(e) });
        }
        const found = await this.store.find(entry.id);
        if (found) {
            info('acquire.subs.found', { videoId: entry.id, path: found });
            return { next: 'DONE', source: 'platform', transcriptPath: found };
        }
        info('acquire.subs.none', { videoId: entry.id, language: this.opts.language });
        return { next: 'GENERATE_VIA_TRANSCRIPTION' };
    }

    private async generate(entry: VideoEntry): Promise<Step> {
        const audio = this.audioPath(entry.id);
        try {
            try {
                await fs.ensureDir(this.opts.tempDir);
                const stale = await purgeTempFiles(this.opts.tempDir, entry.id);
                if (stale.length) warn('acquire.temp.purged', { videoId: entry.id, files: stale });
                await this.downloader.downloadAudio(entry.url, this.audioTemplate(entry.id));
            } catch (e: unknown) {
                return {
                    next: 'FAILED',
                    error: new AcquisitionError(`Audio download failed: ${describeFailure(e)}`, entry.id, 'audio'),
                };
            }
            if (!(await fs.pathExists(audio))) {
                return {
                    next: 'FAILED',
                    error: new AcquisitionError('Audio download produced no file', entry.id, 'audio', { audio }),
                };
            }

            const timer = startStep('acquire.transcribe', { videoId: entry.id, language: this.opts.language });
            try {
                const segments = this.transcriber.transcribe(audio, {
                    language: this.opts.language,
                    initialPrompt: this.opts.initialPrompt,
                    beamSize: this.opts.beamSize,
                });
                const written = await this.store.write(entry.id, this.opts.language, segments);
                timer.end();
                if (written.count === 0) warn('acquire.transcribe.empty', { videoId: entry.id });
                info('acquire.transcribe.done', { videoId: entry.id, segments: written.count, path: written.path });
                return { next: 'DONE', source: 'transcription', transcriptPath: written.path };
            } catch (e: unknown) {
                return {
                    next: 'FAILED',
                    error: new AcquisitionError(`Transcription failed: ${describeFailure(e)}`, entry.id, 'transcription'),
                };
            }
        } finally {
            await purgeTempFiles(this.opts.tempDir, entry.id);
        }
    }

    /**
     * Acquires a single video or every entry of a playlist, one at a time.
     * One bad entry never stops the rest.
     */
    async acquireUrl(url: string): Promise<BatchSummary> {
        let entries: VideoEntry[];
        let title: string | undefined;
        try {
            const resolved = await this.downloader.resolve(url);
            if (resolved.kind === 'playlist') {
                entries = resolved.entries;
                title = resolved.title;
                info('acquire.playlist', { url, title, videos: entries.length });
            } else {
                entries = [resolved.entry];
                title = resolved.entry.title;
            }
        } catch (e: unknown) {
            const err = new AcquisitionError(`Could not resolve ${url}: ${describeFailure(e)}`, toVideoId(url), 'resolve');
            error('acquire.resolve.failed', { url, error: err.message });
            return { url, total: 0, acquired: 0, skipped: 0, failed: 0, outcomes: [], error: err };
        }

        const summary: BatchSummary = { url, title, total: entries.length, acquired: 0, skipped: 0, failed: 0, outcomes: [] };
        const timer = startStep('acquire.batch', { url, total: entries.length });
        for (const [i, entry] of entries.entries()) {
            info('acquire.batch.video', { index: i + 1, total: entries.length, videoId: entry.id });
            let outcome: AcquisitionOutcome;
            try {
                outcome = await this.acquireVideo(entry);
            } catch (e: unknown) {
                const err = new AcquisitionError(`Unexpected failure: ${describeFailure(e)}`, entry.id, 'unexpected');
                warn('acquire.video.crashed', { videoId: entry.id, error: err.message });
                outcome = { videoId: entry.id, title: entry.title, state: 'FAILED', source: null, transcriptPath: null, error: err, trail: [] };
            }
            summary.outcomes.push(outcome);
            if (outcome.state === 'FAILED') summary.failed++;
            else if (outcome.source === 'existing') summary.skipped++;
            else summary.acquired++;
            timer.eta(i + 1, entries.length);
        }
        timer.end();
        info('acquire.batch.summary', {
            url,
            total: summary.total,
            acquired: summary.acquired,
            skipped: summary.skipped,
            failed: summary.failed,
        });
        return summary;
    }
}

