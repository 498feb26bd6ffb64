/**
 * ISO calendar date in YYYY-MM-DD form, interpreted in local time.
 */
export type IsoDate = string;

/**
 * The four fixed hour classifications recorded per week.
 * Each token doubles as the field name in the persisted ledger.
 */
export type Category =
    | 'individual_supervision'
    | 'group_supervision'
    | 'direct'
    | 'indirect';

export const CATEGORIES: readonly Category[] = [
    'individual_supervision',
    'group_supervision',
    'direct',
    'indirect',
] as const;

/**
 * One record per tracking week (Tuesday through Monday).
 */
export interface WeekEntry {
    /** Tuesday that opens the week. */
    start: IsoDate;
    /** Monday that closes the week; always start + 6 days once saved. */
    end: IsoDate;
    individual_supervision: number;
    group_supervision: number;
    direct: number;
    indirect: number;
}

/**
 * The top-level ledger document saved as hours.json.
 */
export interface HoursData {
    weeks: WeekEntry[];
}

/**
 * A 7-day tracking window.
 */
export interface WeekRange {
    start: IsoDate;
    end: IsoDate;
}
