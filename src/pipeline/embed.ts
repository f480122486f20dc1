import { execa } from 'execa';
import { ENV } from './env';
import { EmbeddingError } from './errors';
import { describeFailure, isRecord } from './guards';
import { debug } from './log';
import type { Vector } from './types';

/**
 * Embedding capability: text → fixed-length vector. `model` names the
 * embedding space; vectors from different models are not comparable.
 */
export interface Embedder {
    readonly model: string;
    embed(texts: string[]): Promise<Vector[]>;
}

function isVector(v: unknown): v is Vector {
    return Array.isArray(v) && v.every((x) => typeof x === 'number' && Number.isFinite(x));
}

/** Validates a runner reply `{ "model": "...", "vectors": [[...], ...] }`. */
export function parseEmbedOutput(stdout: string, expected: number): Vector[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(stdout);
    } catch (e: unknown) {
        throw new EmbeddingError(`Embedding runner returned invalid JSON: ${describeFailure(e)}`);
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.vectors)) {
        throw new EmbeddingError('Embedding runner reply has no "vectors" array');
    }
    const vectors: Vector[] = [];
    for (const v of parsed.vectors) {
        if (!isVector(v)) throw new EmbeddingError('Embedding runner returned a non-numeric vector');
        vectors.push(v);
    }
    if (vectors.length !== expected) {
        throw new EmbeddingError(`Expected ${expected} vectors, got ${vectors.length}`, {
            expected,
            received: vectors.length,
        });
    }
    const dim = vectors[0]?.length ?? 0;
    if (vectors.some((v) => v.length !== dim)) {
        throw new EmbeddingError('Embedding runner returned vectors of mixed length');
    }
    return vectors;
}

export interface CommandEmbedderOptions {
    cmd: string;
    args: string[];
    model: string;
}

/**
 * Sends the whole batch to an external runner (sentence-transformers by
 * default) over stdin in one call.
 */
export class CommandEmbedder implements Embedder {
    readonly model: string;
    private cmd: string;
    private args: string[];

    constructor(opts: Partial<CommandEmbedderOptions> = {}) {
        this.model = opts.model ?? ENV.embedModel;
        this.cmd = opts.cmd ?? ENV.embedCmd;
        this.args = opts.args ?? ENV.embedArgs;
    }

    async embed(texts: string[]): Promise<Vector[]> {
        if (texts.length === 0) return [];
        debug('embed.batch', { model: this.model, count: texts.length });
        let stdout: string;
        try {
            const res = await execa(this.cmd, [...this.args, '--model', this.model], {
                input: JSON.stringify({ model: this.model, texts }),
                maxBuffer: 512 * 1024 * 1024,
            });
            stdout = res.stdout;
        } catch (e: unknown) {
            throw new EmbeddingError(`Embedding runner failed: ${describeFailure(e)}`, {
                cmd: this.cmd,
                model: this.model,
            });
        }
        return parseEmbedOutput(stdout, texts.length);
    }
}
