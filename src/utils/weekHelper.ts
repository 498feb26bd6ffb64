import { addDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';
import type { IsoDate, WeekRange } from '../types/hoursData';
import { HoursError } from './errors';

/** Tracking weeks open on a Tuesday (Date#getDay numbering). */
export const WEEK_START_DAY = 2;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a YYYY-MM-DD string as local midnight.
 * Throws an InvalidDate error for anything else, including impossible
 * calendar dates such as 2025-02-30.
 */
export function parseIsoDate(value: string): Date {
    if (!ISO_DATE_PATTERN.test(value)) {
        throw new HoursError('InvalidDate', `Invalid date format: ${value} (expected YYYY-MM-DD)`);
    }
    const date = parseISO(value);
    if (!isValid(date) || formatIsoDate(date) !== value) {
        throw new HoursError('InvalidDate', `Invalid date: ${value}`);
    }
    return date;
}

export function formatIsoDate(date: Date): IsoDate {
    return format(date, 'yyyy-MM-dd');
}

export function isIsoDate(value: string): boolean {
    try {
        parseIsoDate(value);
        return true;
    } catch {
        return false;
    }
}

/**
 * Today's local calendar date.
 */
export function todayIso(now: Date = new Date()): IsoDate {
    return formatIsoDate(now);
}

export function addDaysIso(date: IsoDate, days: number): IsoDate {
    return formatIsoDate(addDays(parseIsoDate(date), days));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
    return differenceInCalendarDays(parseIsoDate(to), parseIsoDate(from));
}

export function isWeekStart(date: IsoDate): boolean {
    return parseIsoDate(date).getDay() === WEEK_START_DAY;
}

/**
 * Maps any date to the Tuesday..Monday window that contains it.
 */
export function weekContaining(date: IsoDate): WeekRange {
    const day = parseIsoDate(date).getDay();
    const daysSinceStart = (day - WEEK_START_DAY + 7) % 7;
    const start = addDaysIso(date, -daysSinceStart);
    return { start, end: addDaysIso(start, 6) };
}

export function currentWeek(today: IsoDate = todayIso()): WeekRange {
    return weekContaining(today);
}

/**
 * Every week from `periodStart` up to and including the week containing
 * `today`, oldest first.
 *
 * `periodStart` is expected to be a Tuesday. It is not corrected: the
 * sequence always steps by 7 days from whatever date is given.
 */
export function allWeeks(periodStart: IsoDate, today: IsoDate = todayIso()): WeekRange[] {
    const { start: currentStart } = weekContaining(today);
    const weeks: WeekRange[] = [];
    let weekStart = periodStart;
    while (weekStart <= currentStart) {
        weeks.push({ start: weekStart, end: addDaysIso(weekStart, 6) });
        weekStart = addDaysIso(weekStart, 7);
    }
    return weeks;
}

/**
 * Human label for a week, e.g. "Jan 28 – Feb 03, 2025".
 */
export function formatWeekLabel(week: WeekRange): string {
    return `${format(parseIsoDate(week.start), 'MMM dd')} – ${format(parseIsoDate(week.end), 'MMM dd, yyyy')}`;
}

/**
 * Long date for report and summary text, e.g. "Jan 28, 2025".
 */
export function formatLongDate(date: IsoDate): string {
    return format(parseIsoDate(date), 'MMM dd, yyyy');
}

/**
 * Week start chosen on the command line, or the current week when omitted.
 */
export function resolveWeekStart(week: string | undefined, today: IsoDate): IsoDate {
    if (week === undefined) {
        return currentWeek(today).start;
    }
    parseIsoDate(week);
    if (!isWeekStart(week)) {
        throw new HoursError('InvalidDate', `Week start date must be a Tuesday, got ${week}`);
    }
    return week;
}
