import { execa } from 'execa';
import { ENV } from './env';
import { describeFailure, isRecord, str } from './guards';
import { toVideoId } from './ids';
import { debug } from './log';
import type { ResolvedSource, TimeRange, VideoEntry } from './types';

/**
 * Platform download capability. Every method writes files through an output
 * template; callers decide success by checking what materialized.
 */
export interface MediaDownloader {
    resolve(url: string): Promise<ResolvedSource>;
    fetchSubtitles(videoUrl: string, outTemplate: string, language: string): Promise<void>;
    downloadAudio(videoUrl: string, outTemplate: string): Promise<void>;
    downloadSection(
        videoUrl: string,
        outTemplate: string,
        range: TimeRange,
        maxHeight: number
    ): Promise<void>;
}

export interface YtDlpOptions {
    bin: string;
    pythonBin: string;
    cookiesFile: string;
    cookiesFromBrowser: string;
    userAgent: string;
    ffmpegLocation: string;
    extraArgs: string[];
    platformBaseUrl: string;
}

export function defaultYtDlpOptions(): YtDlpOptions {
    return {
        bin: ENV.ytdlpBin,
        pythonBin: ENV.ytdlpPythonBin,
        cookiesFile: ENV.ytdlpCookiesFile,
        cookiesFromBrowser: ENV.ytdlpCookiesFromBrowser,
        userAgent: ENV.ytdlpUserAgent,
        ffmpegLocation: ENV.ffmpegLocation,
        extraArgs: ENV.ytdlpExtraArgs,
        platformBaseUrl: ENV.platformBaseUrl,
    };
}

export class YtDlp implements MediaDownloader {
    private opts: YtDlpOptions;

    constructor(opts: Partial<YtDlpOptions> = {}) {
        this.opts = { ...defaultYtDlpOptions(), ...opts };
    }

    /** Request flags shared by every call: auth, identity, ffmpeg location. */
    commonArgs(): string[] {
        const extra: string[] = ['--quiet', '--no-warnings'];
        if (this.opts.cookiesFile) {
            extra.push('--cookies', this.opts.cookiesFile);
        }
        if (this.opts.cookiesFromBrowser) {
            extra.push('--cookies-from-browser', this.opts.cookiesFromBrowser);
        }
        if (this.opts.userAgent) {
            extra.push('--user-agent', this.opts.userAgent);
        }
        if (this.opts.ffmpegLocation) {
            extra.push('--ffmpeg-location', this.opts.ffmpegLocation);
        }
        extra.push(...this.opts.extraArgs);
        return extra;
    }

    /** Tries the configured binary, then `yt-dlp`, then python module fallbacks. */
    async run(args: string[]): Promise<string> {
        const attempts: Array<[string, string[]]> = [];
        attempts.push([this.opts.bin, args]);
        if (this.opts.bin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
        if (this.opts.pythonBin)
            attempts.push([this.opts.pythonBin, ['-m', 'yt_dlp', ...args]]);
        attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);

        const errors: string[] = [];
        for (const [cmd, a] of attempts) {
            try {
                debug('ytdlp.exec', { cmd, args: a });
                const res = await execa(cmd, a, { stdio: 'pipe' });
                return res.stdout;
            } catch (e: unknown) {
                errors.push(`[${cmd}] ${describeFailure(e)}`);
                continue;
            }
        }
        throw new Error(`yt-dlp failed. Errors:\n${errors.join('\n---\n')}`);
    }

    async resolve(url: string): Promise<ResolvedSource> {
        const stdout = await this.run(['--flat-playlist', '-J', ...this.commonArgs(), url]);
        const info: unknown = JSON.parse(stdout);
        if (!isRecord(info)) {
            throw new Error(`No information found for ${url}`);
        }
        if (Array.isArray(info.entries)) {
            const entries: VideoEntry[] = [];
            for (const e of info.entries) {
                if (!isRecord(e)) continue; // unavailable entries come back as null
                const id = str(e.id);
                if (!id) continue;
                entries.push({
                    id,
                    url: str(e.url) ?? `${this.opts.platformBaseUrl}/watch?v=${id}`,
                    title: str(e.title),
                });
            }
            return { kind: 'playlist', title: str(info.title), entries };
        }
        const id = str(info.id) ?? toVideoId(url);
        return {
            kind: 'video',
            entry: {
                id,
                url: str(info.original_url) ?? str(info.webpage_url) ?? url,
                title: str(info.title),
            },
        };
    }

    async fetchSubtitles(videoUrl: string, outTemplate: string, language: string): Promise<void> {
        await this.run([
            '--skip-download',
            '--write-subs',
            '--write-auto-subs',
            '--sub-langs',
            language,
            '--sub-format',
            'vtt',
            '--convert-subs',
            'vtt',
            '-o',
            outTemplate,
            ...this.commonArgs(),
            videoUrl,
        ]);
    }

    async downloadAudio(videoUrl: string, outTemplate: string): Promise<void> {
        await this.run([
            '-f',
            'bestaudio/best',
            '-x',
            '--audio-format',
            'mp3',
            '--audio-quality',
            '192K',
            '-o',
            outTemplate,
            ...this.commonArgs(),
            videoUrl,
        ]);
    }

    async downloadSection(
        videoUrl: string,
        outTemplate: string,
        range: TimeRange,
        maxHeight: number
    ): Promise<void> {
        await this.run([
            '-f',
            `bestvideo[height<=${maxHeight}]+bestaudio/best[height<=${maxHeight}]`,
            '--download-sections',
            `*${range.startSec}-${range.endSec}`,
            '--merge-output-format',
            'mp4',
            '-o',
            outTemplate,
            ...this.commonArgs(),
            videoUrl,
        ]);
    }
}
