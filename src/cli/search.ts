import { createInterface } from 'readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createApp, type App } from '../pipeline/app';
import { DEFAULT_TOP_K, search } from '../pipeline/search';
import { formatHits } from './format';
import { SearchSession } from './session';

async function repl(app: App, limit: number) {
    const session = new SearchSession(app, limit);
    const corpus = await session.open();
    console.log(`Indexed ${corpus.cues.length} cues. Type a query, ":clip <n> [caption]", ":reload" or ":quit".`);
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        let open = true;
        while (open) open = await session.handle(await rl.question('🔎 '));
    } finally {
        rl.close();
    }
}

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .usage('$0 [query..]')
        .option('query', { type: 'string', describe: 'Free-text query' })
        .option('limit', { type: 'number', default: DEFAULT_TOP_K, describe: 'Max results' })
        .option('clip', { type: 'number', describe: 'Render a clip for result #n' })
        .option('caption', { type: 'string', describe: 'Caption for --clip (defaults to the cue text)' })
        .option('json', { type: 'boolean', default: false })
        .option('interactive', { type: 'boolean', alias: 'i', default: false })
        .help()
        .parse();

    const app = createApp();
    if (argv.interactive) {
        await repl(app, argv.limit);
        return;
    }

    const query = argv.query ?? argv._.map(String).join(' ');
    if (!query.trim()) {
        console.error('Provide a query (--query) or use --interactive.');
        process.exit(1);
    }
    const corpus = await app.index.get();
    const res = await search(corpus, app.capabilities.embedder, query, argv.limit, {
        platformBaseUrl: app.env.platformBaseUrl,
    });
    if (res.status === 'unavailable') {
        console.error(res.reason);
        process.exitCode = 1;
        return;
    }
    if (argv.json) {
        console.log(JSON.stringify(res.hits, null, 2));
    } else {
        console.log(formatHits(res.hits));
    }

    if (argv.clip !== undefined) {
        const hit = res.hits[argv.clip - 1];
        if (!hit) {
            console.error(`No result #${argv.clip}.`);
            process.exitCode = 1;
            return;
        }
        const session = new SearchSession(app, argv.limit);
        if (!(await session.renderClip(hit, argv.caption))) process.exitCode = 1;
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
