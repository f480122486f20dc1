import { execa } from 'execa';
import fs from 'fs-extra';
import { ENV } from './env';
import { debug, warn } from './log';

/** Media-encoding capability: input video + filter graph → rendered file. */
export interface Encoder {
    render(input: string, filterGraph: string, output: string): Promise<void>;
}

export class FfmpegEncoder implements Encoder {
    constructor(private bin: string = ENV.ffmpegBin) {}

    async render(input: string, filterGraph: string, output: string): Promise<void> {
        const args = ['-y', '-hide_banner', '-loglevel', 'error', '-nostdin', '-i', input, '-vf', filterGraph, output];
        debug('ffmpeg.exec', { bin: this.bin, args });
        await execa(this.bin, args, { stdio: 'pipe' });
    }
}

export const FONT_CANDIDATES: readonly string[] = [
    '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
    '/usr/share/fonts/dejavu/DejaVuSans.ttf',
    '/usr/share/fonts/TTF/DejaVuSans.ttf',
    '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
    '/usr/share/fonts/truetype/noto/NotoSans-Regular.ttf',
    '/usr/share/fonts/noto/NotoSans-Regular.ttf',
    '/System/Library/Fonts/Supplemental/Arial.ttf',
    '/Library/Fonts/Arial.ttf',
    'C:/Windows/Fonts/arial.ttf',
];

/**
 * Caption font: the configured file if it exists, else the first system font
 * found. Null means let drawtext pick its fontconfig default.
 */
export async function resolveFontFile(
    configured: string = ENV.fontFile,
    candidates: readonly string[] = FONT_CANDIDATES
): Promise<string | null> {
    if (configured) {
        if (await fs.pathExists(configured)) return configured;
        warn('clip.font.missing', { fontFile: configured });
    }
    for (const candidate of candidates) {
        if (await fs.pathExists(candidate)) return candidate;
    }
    warn('clip.font.none', { searched: candidates.length });
    return null;
}

/**
 * Escapes a file path for use inside a quoted filter option. Null when the
 * path cannot be expressed (it contains a single quote).
 */
export function escapeFilterPath(p: string): string | null {
    if (p.includes("'")) return null;
    return p.replace(/\\/g, '/').replace(/:/g, '\\:');
}
