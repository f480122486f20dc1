import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from '../pipeline/env';

/*
 * reset.ts - destructive cleanup utility.
 * By default does NOTHING unless flags provided.
 * Operations:
 *   --clips : delete every rendered clip in the clips directory
 *   --temp  : delete leftover temp_* working files (audio and clip downloads)
 *   --subs  : delete the transcript store
 *   --all   : shorthand for all of the above
 * Safety:
 *   Requires --yes to perform deletions. Otherwise prints plan only.
 */
async function tempFiles(dirs: string[]): Promise<string[]> {
  const found: string[] = [];
  for (const dir of new Set(dirs.map((d) => path.resolve(d)))) {
    if (!(await fs.pathExists(dir))) continue;
    for (const f of await fs.readdir(dir)) {
      if (f.startsWith('temp_')) found.push(path.join(dir, f));
    }
  }
  return found;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('clips', { type: 'boolean', default: false })
    .option('temp', { type: 'boolean', default: false })
    .option('subs', { type: 'boolean', default: false })
    .option('all', { type: 'boolean', default: false })
    .option('yes', { type: 'boolean', default: false, describe: 'Confirm destructive actions' })
    .help()
    .parse();

  const ops = {
    clips: argv.all || argv.clips,
    temp: argv.all || argv.temp,
    subs: argv.all || argv.subs,
  };

  const temps = ops.temp ? await tempFiles([ENV.tempDir, ENV.clipsDir]) : [];
  const plan: string[] = [];
  if (ops.clips) plan.push(`Delete clips dir: ${path.resolve(ENV.clipsDir)}`);
  if (ops.temp) plan.push(`Delete ${temps.length} temp file(s)`);
  if (ops.subs) plan.push(`Delete transcript store: ${path.resolve(ENV.subsDir)}`);

  if (!plan.length) {
    console.log('Nothing selected. Use --all or specific flags (see --help).');
    return;
  }
  console.log('Reset plan:');
  for (const p of plan) console.log(' -', p);

  if (!argv.yes) {
    console.log('\nDry run only. Re-run with --yes to execute.');
    return;
  }

  if (ops.temp) {
    for (const f of temps) await fs.remove(f);
    console.log('Temp files removed.');
  }
  if (ops.clips) {
    await fs.remove(ENV.clipsDir);
    await fs.ensureDir(ENV.clipsDir);
    console.log('Clips cleared.');
  }
  if (ops.subs) {
    await fs.remove(ENV.subsDir);
    await fs.ensureDir(ENV.subsDir);
    console.log('Transcripts cleared.');
  }
  console.log('Reset complete.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
