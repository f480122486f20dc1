import type { SearchHit } from '../pipeline/types';

export function confidencePct(score: number): number {
  return Math.floor(score * 100);
}

export function formatHit(hit: SearchHit, rank: number): string {
  return (
    `${rank}. "${hit.cue.text}"\n` +
    `   Confidence: ${confidencePct(hit.score)}% | Time: ${hit.cue.timestamp} | Video: ${hit.cue.videoId}\n` +
    `   ▶ ${hit.watchUrl}`
  );
}

export function formatHits(hits: SearchHit[]): string {
  if (hits.length === 0) return 'No relevant moments found.';
  return hits.map((h, i) => formatHit(h, i + 1)).join('\n\n');
}

/** Parses `:clip <n> [caption]`; null when it is not a clip command. */
export function parseClipCommand(line: string): { rank: number; caption?: string } | null {
  const m = line.trim().match(/^:clip\s+(\d+)(?:\s+(.+))?$/);
  if (!m) return null;
  const caption = m[2]?.trim();
  return { rank: Number(m[1]), caption: caption || undefined };
}
