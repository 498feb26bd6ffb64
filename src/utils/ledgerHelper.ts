import { CATEGORIES } from '../types/hoursData';
import type { Category, HoursData, IsoDate, WeekEntry } from '../types/hoursData';
import { HoursError } from './errors';
import { weekContaining } from './weekHelper';

interface CategoryLabels {
    /** Column header in tables, e.g. "Ind Sv". */
    short: string;
    /** Prompt and report label, e.g. "Individual Supervision". */
    long: string;
}

export const CATEGORY_LABELS: Record<Category, CategoryLabels> = {
    individual_supervision: { short: 'Ind Sv', long: 'Individual Supervision' },
    group_supervision: { short: 'Grp Sv', long: 'Group Supervision' },
    direct: { short: 'Direct', long: 'Direct (client contact)' },
    indirect: { short: 'Indirect', long: 'Indirect' },
};

export function emptyLedger(): HoursData {
    return { weeks: [] };
}

export function createWeekEntry(start: IsoDate, end: IsoDate): WeekEntry {
    return {
        start,
        end,
        individual_supervision: 0,
        group_supervision: 0,
        direct: 0,
        indirect: 0,
    };
}

export function weekTotal(entry: WeekEntry): number {
    return entry.individual_supervision + entry.group_supervision + entry.direct + entry.indirect;
}

export function getHours(entry: WeekEntry, category: Category): number {
    return entry[category];
}

/**
 * Overwrites one category. No validation: negative values are only rejected
 * when the ledger is saved.
 */
export function setHours(entry: WeekEntry, category: Category, value: number): void {
    entry[category] = value;
}

export function addHours(entry: WeekEntry, category: Category, delta: number): void {
    entry[category] += delta;
}

export function isCategory(value: string): value is Category {
    return (CATEGORIES as readonly string[]).includes(value);
}

export function parseCategory(token: string): Category {
    if (isCategory(token)) {
        return token;
    }
    throw new HoursError(
        'InvalidCategory',
        `Invalid category '${token}'. Valid categories: ${CATEGORIES.join(', ')}`
    );
}

export function findWeek(data: HoursData, start: IsoDate): WeekEntry | undefined {
    return data.weeks.find(w => w.start === start);
}

/**
 * Returns the entry for the week opening on `start`, appending a zeroed one
 * if the ledger has none yet.
 */
export function getOrCreateWeek(data: HoursData, start: IsoDate): WeekEntry {
    const existing = findWeek(data, start);
    if (existing) {
        return existing;
    }
    const { end } = weekContaining(start);
    const entry = createWeekEntry(start, end);
    data.weeks.push(entry);
    return entry;
}

export function cloneLedger(data: HoursData): HoursData {
    return { weeks: data.weeks.map(w => ({ ...w })) };
}

/**
 * Per-category sums across every week.
 */
export function categoryTotals(weeks: readonly WeekEntry[]): Record<Category, number> {
    const totals: Record<Category, number> = {
        individual_supervision: 0,
        group_supervision: 0,
        direct: 0,
        indirect: 0,
    };
    for (const week of weeks) {
        for (const category of CATEGORIES) {
            totals[category] += week[category];
        }
    }
    return totals;
}
