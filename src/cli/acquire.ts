import path from 'path';
import { createInterface } from 'readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createApp } from '../pipeline/app';
import { ENV } from '../pipeline/env';
import { closeLogFile, currentLogFile, setLogFile } from '../pipeline/log';

async function promptForUrl(): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        return (await rl.question('Enter video or playlist URL: ')).trim();
    } finally {
        rl.close();
    }
}

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .usage('$0 [url]')
        .option('url', { type: 'string', describe: 'Single video or playlist URL' })
        .option('language', { type: 'string', default: ENV.language, describe: 'Subtitle / transcription language' })
        .help()
        .parse();

    const url = argv.url ?? (argv._.length ? String(argv._[0]) : await promptForUrl());
    if (!url) {
        console.error('No URL given.');
        process.exit(1);
    }

    const runLogPath = path.resolve(ENV.logsDir, `acquire-${Date.now()}.log`);
    setLogFile(runLogPath);
    const app = createApp(undefined, { ...ENV, language: argv.language });
    const logFile = currentLogFile();
    const summary = await app.acquisition.acquireUrl(url);
    closeLogFile();

    console.log(`\n=== Acquisition Summary ===`);
    if (summary.error) {
        console.log(`Could not read ${url}: ${summary.error.message}`);
        process.exitCode = 1;
    }
    if (summary.title) console.log(`Source:    ${summary.title}`);
    for (const o of summary.outcomes) {
        const status = o.state === 'DONE' ? `ok (${o.source})` : `FAILED: ${o.error?.message ?? 'unknown error'}`;
        console.log(` - ${o.videoId}${o.title ? ` "${o.title}"` : ''}: ${status}`);
    }
    console.log(`Total listed: ${summary.total}`);
    console.log(`Acquired:     ${summary.acquired}`);
    console.log(`Skipped:      ${summary.skipped}`);
    console.log(`Failed:       ${summary.failed}`);
    if (logFile) console.log(`Run log:      ${logFile}`);
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
