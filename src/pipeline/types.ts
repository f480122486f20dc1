export type ISO8601 = string;

/** One timed unit produced by the transcription capability. */
export interface Segment {
  startSec: number;
  endSec: number;
  text: string;
}

/** One caption unit read from a transcript file. */
export interface Cue {
  videoId: string;
  startSec: number;
  endSec: number;
  /** Start offset as written in the transcript, `HH:MM:SS.mmm`. */
  timestamp: string;
  text: string;
}

export type Vector = number[];

export interface Corpus {
  /** Identity of the embedding model that produced `embeddings`. */
  model: string;
  cues: Cue[];
  embeddings: Vector[];
  builtAt: ISO8601;
}

export interface SearchHit {
  cue: Cue;
  corpusIndex: number;
  score: number;
  seekSec: number;
  watchUrl: string;
}

export type SearchResponse =
  | { status: 'ok'; hits: SearchHit[] }
  | { status: 'unavailable'; reason: string };

export interface ClipKey {
  videoId: string;
  second: number;
  caption: string;
}

export interface ClipArtifact {
  path: string;
  key: ClipKey;
  cached: boolean;
}

export interface VideoEntry {
  id: string;
  url: string;
  title?: string;
}

export type ResolvedSource =
  | { kind: 'video'; entry: VideoEntry }
  | { kind: 'playlist'; title?: string; entries: VideoEntry[] };

export interface TimeRange {
  startSec: number;
  endSec: number;
}
