import { TranscriptParseError } from './errors';
import type { Segment } from './types';

export interface ParsedCue {
  startSec: number;
  endSec: number;
  timestamp: string;
  text: string;
}

const TIMESTAMP_RE = /^(?:(\d+):)?(\d{1,2}):(\d{2})[.,](\d{3})$/;
const TIMING_RE = /^(\S+)\s+-->\s+(\S+)/;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
  '&lrm;': '',
  '&rlm;': '',
};

/** Seconds for `HH:MM:SS.mmm` or `MM:SS.mmm`; null when malformed. */
export function parseTimestamp(value: string): number | null {
  const m = value.match(TIMESTAMP_RE);
  if (!m) return null;
  const h = m[1] ? Number(m[1]) : 0;
  const min = Number(m[2]);
  const s = Number(m[3]);
  if (min > 59 || s > 59) return null;
  return h * 3600 + min * 60 + s + Number(m[4]) / 1000;
}

export function formatTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)}.${pad(ms, 3)}`;
}

/** Strips inline markup (`<c>`, `<i>`, karaoke timestamps) and collapses whitespace. */
export function cleanCueText(raw: string): string {
  return raw
    .replace(/<[^>]*>/g, '')
    .replace(/&(?:amp|lt|gt|quot|#39|nbsp|lrm|rlm);/g, (e) => ENTITIES[e] ?? e)
    .replace(/\s+/g, ' ')
    .trim();
}

export function parseVtt(content: string, file = '<memory>'): ParsedCue[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  const first = lines.findIndex((l) => l.trim() !== '');
  if (first < 0 || !lines[first].startsWith('WEBVTT')) {
    throw new TranscriptParseError('missing WEBVTT header', file, first < 0 ? 1 : first + 1);
  }

  const cues: ParsedCue[] = [];
  let i = first;
  // skip header block
  while (i < lines.length && lines[i] !== '') i++;

  while (i < lines.length) {
    while (i < lines.length && lines[i].trim() === '') i++;
    if (i >= lines.length) break;
    const blockStart = i;
    const block: string[] = [];
    // only an empty line ends a cue; auto captions put " " lines inside cue text
    while (i < lines.length && lines[i] !== '') {
      block.push(lines[i]);
      i++;
    }
    if (/^(NOTE|STYLE|REGION)\b/.test(block[0])) continue;

    let timingIdx = 0;
    if (!block[0].includes('-->')) {
      if (block.length > 1 && block[1].includes('-->')) {
        timingIdx = 1; // cue identifier line
      } else {
        throw new TranscriptParseError('expected cue timings', file, blockStart + 1);
      }
    }
    const timing = block[timingIdx].trim().match(TIMING_RE);
    const startSec = timing ? parseTimestamp(timing[1]) : null;
    const endSec = timing ? parseTimestamp(timing[2]) : null;
    if (startSec === null || endSec === null) {
      throw new TranscriptParseError(`malformed cue timings "${block[timingIdx]}"`, file, blockStart + timingIdx + 1);
    }
    cues.push({
      startSec,
      endSec,
      timestamp: formatTimestamp(startSec),
      text: cleanCueText(block.slice(timingIdx + 1).join('\n')),
    });
  }
  return cues;
}

export function formatVtt(segments: Iterable<Segment>): string {
  let out = 'WEBVTT\n\n';
  for (const seg of segments) {
    const text = seg.text.replace(/\s+/g, ' ').trim();
    out += `${formatTimestamp(seg.startSec)} --> ${formatTimestamp(seg.endSec)}\n${text}\n\n`;
  }
  return out;
}
