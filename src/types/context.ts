import type { IsoDate } from './hoursData';

/**
 * What every command needs from the invoking process.
 */
export interface CommandContext {
    /** Environment used for config lookup and overrides (HOURS_*). */
    env: Record<string, string | undefined>;
    /** Local calendar date the command runs "as of". */
    today: IsoDate;
    /** True when --no-git or HOURS_NO_GIT=1 is in effect. */
    noGit: boolean;
}
