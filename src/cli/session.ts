import type { App } from '../pipeline/app';
import { PipelineError } from '../pipeline/errors';
import { search } from '../pipeline/search';
import type { Corpus, SearchHit } from '../pipeline/types';
import { formatHits, parseClipCommand } from './format';

export interface SessionOutput {
    out: (text: string) => void;
    err: (text: string) => void;
}

const consoleOutput: SessionOutput = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
};

/**
 * One interactive search session: a corpus snapshot plus the hits of the last
 * query, so `:clip <n>` can refer back to them. A failing line is reported
 * and the session goes on.
 */
export class SearchSession {
    private corpus: Corpus | null = null;
    private lastHits: SearchHit[] = [];

    constructor(
        private app: App,
        private limit: number,
        private io: SessionOutput = consoleOutput
    ) {}

    async open(): Promise<Corpus> {
        this.corpus = await this.app.index.get();
        return this.corpus;
    }

    /** Renders the clip for `hit`; false when synthesis failed. */
    async renderClip(hit: SearchHit, caption?: string): Promise<boolean> {
        try {
            const clip = await this.app.clips.synthesize(hit.cue.videoId, hit.seekSec, caption ?? hit.cue.text);
            this.io.out(`Clip${clip.cached ? ' (cached)' : ''}: ${clip.path}`);
            return true;
        } catch (e) {
            if (!(e instanceof PipelineError)) throw e;
            this.io.err(`Clip failed: ${e.message}`);
            return false;
        }
    }

    /** Handles one input line; resolves to false when the session should end. */
    async handle(input: string): Promise<boolean> {
        const line = input.trim();
        if (!line) return true;
        if (line === ':quit' || line === ':q') return false;
        try {
            await this.dispatch(line);
        } catch (e) {
            if (!(e instanceof PipelineError)) throw e;
            this.io.err(`${e.name}: ${e.message}`);
        }
        return true;
    }

    private async dispatch(line: string): Promise<void> {
        if (line === ':reload') {
            this.corpus = await this.app.index.reload();
            this.io.out(`Reloaded: ${this.corpus.cues.length} cues.`);
            return;
        }
        const clipCmd = parseClipCommand(line);
        if (clipCmd) {
            const hit = this.lastHits[clipCmd.rank - 1];
            if (!hit) this.io.err(`No result #${clipCmd.rank}.`);
            else await this.renderClip(hit, clipCmd.caption);
            return;
        }
        const corpus = this.corpus ?? (await this.open());
        const res = await search(corpus, this.app.capabilities.embedder, line, this.limit, {
            platformBaseUrl: this.app.env.platformBaseUrl,
        });
        if (res.status === 'unavailable') {
            this.io.err(res.reason);
            return;
        }
        this.lastHits = res.hits;
        this.io.out(formatHits(res.hits));
    }
}
