/* Structured logger with step timing & ETA. Writes to stderr so command output on stdout stays parseable. */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

export const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export function atLeast(level: LogLevel, min: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
}

interface LoggerState {
  level: LogLevel;
  format: LogFormat;
  progressIntervalMs: number;
  /** Run log sink; always JSON lines regardless of `format`. */
  file: { path: string; fd: number } | null;
}

const state: LoggerState = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
  progressIntervalMs: Number(process.env.PROGRESS_INTERVAL_MS || 1500),
  file: null,
};

export function setLogLevel(l: LogLevel) {
  state.level = l;
}

export interface StepTimer {
  end: () => void;
  eta: (done: number, total: number) => void;
}

const COLORS: Record<LogLevel, string> = {
  debug: '\u001b[90m',
  info: '\u001b[36m',
  warn: '\u001b[33m',
  error: '\u001b[31m',
};

function pretty(level: LogLevel, t: string, msg: string, meta?: LogMeta): string {
  const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
  return `${COLORS[level]}${t} ${level.toUpperCase()} ${msg}\u001b[0m${metaStr}`;
}

const lastProgress: Record<string, number> = {};

/** Mirrors every emitted record into `filePath` (appending) until closed or replaced. */
export function setLogFile(filePath: string) {
  closeLogFile();
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    state.file = { path: filePath, fd: fs.openSync(filePath, 'a') };
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

export function currentLogFile(): string | null {
  return state.file ? state.file.path : null;
}

export function closeLogFile() {
  if (state.file) {
    fs.closeSync(state.file.fd);
    state.file = null;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (!atLeast(level, state.level)) return;
  const t = new Date().toISOString();
  const line = JSON.stringify({ t, level, msg, ...(meta || {}) });
  if (state.file) fs.writeSync(state.file.fd, line + '\n');
  // eslint-disable-next-line no-console
  console.error(state.format === 'json' ? line : pretty(level, t, msg, meta));
}

export function shouldEmitProgress(key: string) {
  const now = performance.now();
  const last = lastProgress[key] || 0;
  if (now - last < state.progressIntervalMs) return false;
  lastProgress[key] = now;
  return true;
}

export function debug(msg: string, meta?: LogMeta) {
  log("debug", msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log("info", msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log("warn", msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log("error", msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: () => {
      info(`end:${name}`, { ms: Math.round(performance.now() - start), ...meta });
    },
    eta: (done: number, total: number) => {
      if (total <= 0 || !shouldEmitProgress(name)) return;
      const elapsed = performance.now() - start;
      const remaining = done > 0 ? (elapsed / done) * (total - done) : 0;
      info(`progress:${name}`, {
        done,
        total,
        pct: Number(((done / total) * 100).toFixed(2)),
        etaMs: Math.round(remaining),
      });
    },
  };
}
