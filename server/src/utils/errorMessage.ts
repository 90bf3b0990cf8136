// Narrow an unknown thrown value to a loggable one-line message.
export function errorMessage(err: unknown): string {
    const msg = err instanceof Error ? err.message : String(err);
    return msg.split('\n')[0] ?? msg;
}
