import fs from 'fs-extra';
import path from 'path';

/** Deletes `temp_<videoId>.*` and `temp_<videoId>_*` working files in `dir`; returns the names removed. */
export async function purgeTempFiles(dir: string, videoId: string): Promise<string[]> {
    if (!(await fs.pathExists(dir))) return [];
    const prefixes = [`temp_${videoId}.`, `temp_${videoId}_`];
    const stale = (await fs.readdir(dir)).filter((f) => prefixes.some((p) => f.startsWith(p)));
    for (const f of stale) await fs.remove(path.join(dir, f));
    return stale;
}
