export interface Logger {
    error(message: string, error?: unknown): void;
    debug(message: string): void;
}

/**
 * Diagnostics go to stderr so they never mix with the game board on stdout.
 * Debug lines are dropped unless enabled.
 */
export function createLogger(options: { debug: boolean }, sink: Pick<Console, 'error'> = console): Logger {
    return {
        error(message, error) {
            const detail = error instanceof Error ? `: ${error.message}` : '';
            sink.error(`[termle] ❌ ${message}${detail}`);
        },
        debug(message) {
            if (options.debug) {
                sink.error(`[termle:debug] ${message}`);
            }
        },
    };
}
