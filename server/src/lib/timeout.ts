// =============================================================================
// lib/timeout.ts — bound a promise by wall-clock time.
//
// Races the work against a timer; used for both the store query and the
// Gemini call. The timer is cleared either way, so a settled call never keeps
// the event loop alive.
// =============================================================================

export class TimeoutError extends Error {
    readonly timeoutMs: number;
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs} ms`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([work, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
