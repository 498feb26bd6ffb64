const TAG = '[hours]';

function debugEnabled(): boolean {
    return process.env.HOURS_DEBUG === '1';
}

/**
 * Diagnostic line on stderr, only when HOURS_DEBUG=1.
 */
export function debug(message: string): void {
    if (debugEnabled()) {
        console.error(`${TAG} ${message}`);
    }
}

/**
 * Non-fatal problem the user should know about. Never fails the command.
 */
export function warn(message: string): void {
    console.warn(`Warning: ${message}`);
}
