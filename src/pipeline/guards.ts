export function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function str(v: unknown): string | undefined {
    return typeof v === 'string' && v ? v : undefined;
}

export function num(v: unknown): number | undefined {
    return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

/** Best human-readable text from a thrown value, preferring a child process's output. */
export function describeFailure(e: unknown): string {
    if (isRecord(e)) {
        for (const k of ['stderr', 'stdout', 'shortMessage', 'message']) {
            const v = str(e[k]);
            if (v) return v;
        }
    }
    if (e instanceof Error) return e.message;
    return String(e);
}
