import { execa } from 'execa';
import readline from 'readline';
import { ENV } from './env';
import { TranscriptionError } from './errors';
import { describeFailure, isRecord, num } from './guards';
import { debug, warn } from './log';
import type { Segment } from './types';

export interface TranscribeOptions {
    language: string;
    /** Priming phrase that biases the model toward the language's grammar. */
    initialPrompt?: string;
    beamSize?: number;
}

/**
 * Transcription capability. Segments arrive in order as the model produces
 * them; the sequence is finite and single-pass.
 */
export interface Transcriber {
    transcribe(audioPath: string, opts: TranscribeOptions): AsyncIterable<Segment>;
}

const PRIMING_PHRASES: Record<string, string> = {
    el: 'Αυτό είναι ένα βίντεο στα Ελληνικά.',
    en: 'This is a video in English.',
    es: 'Este es un vídeo en español.',
    fr: 'Ceci est une vidéo en français.',
    de: 'Dies ist ein Video auf Deutsch.',
    it: 'Questo è un video in italiano.',
};

export function primingPhraseFor(language: string, override = ENV.transcribePrompt): string | undefined {
    if (override) return override;
    return PRIMING_PHRASES[language];
}

/** One runner output line `{"start": 1.2, "end": 3.4, "text": "..."}`; null when not a segment. */
export function parseSegmentLine(line: string): Segment | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch {
        return null;
    }
    if (!isRecord(parsed)) return null;
    const startSec = num(parsed.start);
    const endSec = num(parsed.end);
    if (startSec === undefined || endSec === undefined || typeof parsed.text !== 'string') return null;
    return { startSec, endSec, text: parsed.text.trim() };
}

export interface CommandTranscriberOptions {
    cmd: string;
    args: string[];
    model: string;
    device: string;
    computeType: string;
}

/**
 * Runs an external transcription runner (faster-whisper by default) that
 * prints one JSON segment per line while it works.
 */
export class CommandTranscriber implements Transcriber {
    private opts: CommandTranscriberOptions;

    constructor(opts: Partial<CommandTranscriberOptions> = {}) {
        this.opts = {
            cmd: ENV.transcribeCmd,
            args: ENV.transcribeArgs,
            model: ENV.transcribeModel,
            device: ENV.transcribeDevice,
            computeType: ENV.transcribeComputeType,
            ...opts,
        };
    }

    args(audioPath: string, opts: TranscribeOptions): string[] {
        const args = [
            ...this.opts.args,
            '--audio',
            audioPath,
            '--language',
            opts.language,
            '--beam-size',
            String(opts.beamSize ?? ENV.transcribeBeamSize),
            '--model',
            this.opts.model,
            '--device',
            this.opts.device,
            '--compute-type',
            this.opts.computeType,
        ];
        if (opts.initialPrompt) args.push('--initial-prompt', opts.initialPrompt);
        return args;
    }

    async *transcribe(audioPath: string, opts: TranscribeOptions): AsyncIterable<Segment> {
        const proc = execa(this.opts.cmd, this.args(audioPath, opts), { stdio: ['ignore', 'pipe', 'pipe'] });
        // resolves to the runner's failure, or null on a clean exit
        const exited: Promise<unknown> = proc.then(
            () => null,
            (e: unknown) => e
        );
        if (!proc.stdout) {
            proc.kill();
            await exited;
            throw new TranscriptionError('Transcription runner has no stdout', { cmd: this.opts.cmd });
        }
        proc.stderr?.on('data', (d: Buffer) => {
            const line = d.toString().trim();
            if (line) debug('transcribe.runner.log', { line });
        });
        const lines = readline.createInterface({ input: proc.stdout, crlfDelay: Infinity });
        let count = 0;
        try {
            for await (const line of lines) {
                const seg = parseSegmentLine(line);
                if (!seg) {
                    if (line.trim()) warn('transcribe.runner.skipLine', { line: line.slice(0, 200) });
                    continue;
                }
                count++;
                yield seg;
            }
            const failure = await exited;
            if (failure !== null) {
                throw new TranscriptionError(`Transcription runner failed: ${describeFailure(failure)}`, {
                    cmd: this.opts.cmd,
                    audioPath,
                    segments: count,
                });
            }
        } finally {
            // consumer stopped early
            if (proc.exitCode === null) {
                proc.kill();
                await exited;
            }
        }
    }
}
