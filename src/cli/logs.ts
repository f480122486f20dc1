import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isRecord } from '../pipeline/guards';
import { atLeast, isLogLevel, type LogLevel } from '../pipeline/log';

const RUN_LOG = /^acquire-(\d+)\.log$/;

/** Newest `acquire-<ms>.log` in `dir`, or null. */
function latestRunLog(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs
    .readdirSync(dir)
    .map((f) => ({ f, m: f.match(RUN_LOG) }))
    .filter((c) => c.m !== null)
    .sort((a, b) => Number(b.m?.[1]) - Number(a.m?.[1]));
  return candidates.length ? path.join(dir, candidates[0].f) : null;
}

/** True when a JSON log line is at or above `min`; non-JSON lines always pass. */
function passesLevel(line: string, min: LogLevel): boolean {
  let obj: unknown;
  try {
    obj = JSON.parse(line);
  } catch {
    return true;
  }
  const level = isRecord(obj) ? obj.level : undefined;
  return isLogLevel(level) ? atLeast(level, min) : true;
}

function tailFile(file: string, min: LogLevel, from: number) {
  let size = from;
  let pending = '';
  setInterval(() => {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(file);
    } catch (e) {
      console.error('Log file unavailable:', e instanceof Error ? e.message : e);
      process.exit(1);
    }
    if (stat.size <= size) return;
    const stream = fs.createReadStream(file, { start: size, end: stat.size - 1, encoding: 'utf8' });
    size = stat.size;
    stream.on('data', (chunk) => {
      const lines = (pending + String(chunk)).split(/\r?\n/);
      pending = lines.pop() ?? '';
      for (const l of lines) if (l.trim() && passesLevel(l, min)) process.stdout.write(l + '\n');
    });
  }, 1500);
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('file', { type: 'string', describe: 'Explicit log file path (defaults to the latest acquisition run)' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .parse();

  const file = argv.file ?? latestRunLog(path.resolve(ENV.logsDir));
  if (!file) {
    console.error('No acquire-*.log found in', path.resolve(ENV.logsDir));
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min: LogLevel = isLogLevel(argv.level) ? argv.level : 'debug';

  const content = fs.readFileSync(file, 'utf8');
  for (const line of content.split(/\r?\n/)) {
    if (line.trim() && passesLevel(line, min)) process.stdout.write(line + '\n');
  }
  if (argv.follow) tailFile(file, min, Buffer.byteLength(content));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
