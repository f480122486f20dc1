import fs from 'fs-extra';
import path from 'path';
import type { Cue, Segment } from './types';
import { formatVtt, parseVtt } from './vtt';

export interface TranscriptFile {
    videoId: string;
    path: string;
}

/**
 * Directory of `<videoId>.<lang>.vtt` files. A file's presence means the
 * video has been acquired; files are written once and never edited.
 */
export class TranscriptStore {
    readonly dir: string;

    constructor(dir: string) {
        this.dir = path.resolve(dir);
    }

    static videoIdOf(fileName: string): string {
        return path.basename(fileName).split('.')[0];
    }

    pathFor(videoId: string, language: string): string {
        return path.join(this.dir, `${videoId}.${language}.vtt`);
    }

    /** Output template for tools that append `.<lang>.vtt` themselves. */
    outputTemplate(videoId: string): string {
        return path.join(this.dir, videoId);
    }

    async exists(): Promise<boolean> {
        return fs.pathExists(this.dir);
    }

    async list(): Promise<TranscriptFile[]> {
        if (!(await this.exists())) return [];
        const names = (await fs.readdir(this.dir)).filter((f) => f.endsWith('.vtt'));
        return names.map((name) => ({
            videoId: TranscriptStore.videoIdOf(name),
            path: path.join(this.dir, name),
        }));
    }

    /** First transcript belonging to `videoId`, in any language. */
    async find(videoId: string): Promise<string | null> {
        const files = await this.list();
        const match = files.find((f) => f.videoId === videoId);
        return match ? match.path : null;
    }

    async read(file: TranscriptFile): Promise<Cue[]> {
        const content = await fs.readFile(file.path, 'utf8');
        return parseVtt(content, file.path).map((c) => ({ videoId: file.videoId, ...c }));
    }

    /**
     * Drains `segments` completely, then writes the transcript in one step so
     * an interrupted run never leaves a file that looks acquired.
     */
    async write(
        videoId: string,
        language: string,
        segments: AsyncIterable<Segment> | Iterable<Segment>
    ): Promise<{ path: string; count: number }> {
        const collected: Segment[] = [];
        for await (const seg of segments) collected.push(seg);
        const target = this.pathFor(videoId, language);
        const partial = `${target}.partial`;
        await fs.outputFile(partial, formatVtt(collected), 'utf8');
        await fs.move(partial, target, { overwrite: true });
        return { path: target, count: collected.length };
    }
}
