import type { IsoDate } from './hoursData';

/**
 * Licensure goals measured by `hours summary` and the exported report.
 */
export interface LicensureTarget {
    /** First Tuesday of the licensure period. */
    startDate: IsoDate;
    totalHoursTarget: number;
    directHoursTarget: number;
    minMonths: number;
    minWeeklyAverage: number;
}

export interface GitConfig {
    /** Remote name pushed to after each commit, e.g. "origin". */
    remote: string;
    autoPush: boolean;
}

export interface DataConfig {
    /** Directory holding hours.json; `~` is expanded on load. */
    directory: string;
}

/**
 * Contents of config.json.
 */
export interface TrackerConfig {
    data: DataConfig;
    git: GitConfig;
    licensure: LicensureTarget;
}
