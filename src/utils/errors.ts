export type HoursErrorCode =
    | 'IoError'
    | 'ParseError'
    | 'InvalidWeekStart'
    | 'InvalidWeekEnd'
    | 'NegativeHours'
    | 'DuplicateWeek'
    | 'InvalidCategory'
    | 'InvalidDate'
    | 'InvalidHours'
    | 'ConfigError';

/**
 * Every failure the tracker reports carries one of the codes above so callers
 * can branch on the kind of failure without matching message text.
 */
export class HoursError extends Error {
    readonly code: HoursErrorCode;

    constructor(code: HoursErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HoursError';
        this.code = code;
    }
}

/**
 * Renders an unknown thrown value as text for inclusion in an error message.
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
