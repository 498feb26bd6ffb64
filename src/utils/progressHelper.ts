import type { LicensureTarget } from '../types/config';
import type { HoursData, IsoDate, WeekEntry } from '../types/hoursData';
import { weekTotal } from './ledgerHelper';
import { currentWeek, daysBetween, parseIsoDate } from './weekHelper';

export interface ProgressMetric {
    current: number;
    target: number;
    /** current / target * 100, or 0 when the target is not positive. */
    percentage: number;
}

/**
 * Full-precision progress figures. Round with `roundTenth` only when
 * displaying or serializing.
 */
export interface ProgressReport {
    startDate: IsoDate;
    today: IsoDate;
    totalHours: ProgressMetric;
    directHours: ProgressMetric;
    months: ProgressMetric;
    weeklyAverage: ProgressMetric;
    weeksElapsed: number;
    weeksLogged: number;
    /** First and last recorded weeks, in ledger order. */
    firstWeekStart?: IsoDate;
    latestWeekStart?: IsoDate;
    latestWeekEnd?: IsoDate;
}

/**
 * Rounds to one decimal place, halves away from zero.
 */
export function roundTenth(value: number): number {
    return (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
}

export function percentOf(current: number, target: number): number {
    return target > 0 ? (current / target) * 100 : 0;
}

/**
 * Whole calendar months from `start` to `end`. A month only counts once the
 * day-of-month of `end` reaches that of `start`; never negative.
 */
export function monthsBetween(start: IsoDate, end: IsoDate): number {
    if (end < start) {
        return 0;
    }
    const s = parseIsoDate(start);
    const e = parseIsoDate(end);
    let months = (e.getFullYear() - s.getFullYear()) * 12 + (e.getMonth() - s.getMonth());
    if (e.getDate() < s.getDate()) {
        months -= 1;
    }
    return Math.max(months, 0);
}

/**
 * Tracking weeks from the period start through the current week, inclusive.
 * Falls back to 1 when the period has not started yet.
 */
export function weeksElapsed(start: IsoDate, today: IsoDate): number {
    const { start: currentStart } = currentWeek(today);
    if (currentStart >= start) {
        return Math.floor(daysBetween(start, currentStart) / 7) + 1;
    }
    return 1;
}

export function totalHours(data: HoursData): number {
    return data.weeks.reduce((sum, w) => sum + weekTotal(w), 0);
}

export function directHours(data: HoursData): number {
    return data.weeks.reduce((sum, w) => sum + w.direct, 0);
}

export function weeksLogged(data: HoursData): number {
    return data.weeks.filter(w => weekTotal(w) > 0).length;
}

export function calculateProgress(data: HoursData, target: LicensureTarget, today: IsoDate): ProgressReport {
    const total = totalHours(data);
    const direct = directHours(data);
    const months = monthsBetween(target.startDate, today);
    const elapsed = weeksElapsed(target.startDate, today);
    const average = elapsed > 0 ? total / elapsed : 0;

    // A loaded file is not guaranteed to be sorted.
    let first: WeekEntry | undefined;
    let last: WeekEntry | undefined;
    for (const week of data.weeks) {
        if (!first || week.start < first.start) {
            first = week;
        }
        if (!last || week.start > last.start) {
            last = week;
        }
    }

    return {
        startDate: target.startDate,
        today,
        totalHours: {
            current: total,
            target: target.totalHoursTarget,
            percentage: percentOf(total, target.totalHoursTarget),
        },
        directHours: {
            current: direct,
            target: target.directHoursTarget,
            percentage: percentOf(direct, target.directHoursTarget),
        },
        months: {
            current: months,
            target: target.minMonths,
            percentage: percentOf(months, target.minMonths),
        },
        weeklyAverage: {
            current: average,
            target: target.minWeeklyAverage,
            percentage: percentOf(average, target.minWeeklyAverage),
        },
        weeksElapsed: elapsed,
        weeksLogged: weeksLogged(data),
        firstWeekStart: first?.start,
        latestWeekStart: last?.start,
        latestWeekEnd: last?.end,
    };
}

/**
 * JSON shape printed by `hours summary --json`.
 */
export function progressToJson(report: ProgressReport): Record<string, unknown> {
    const metric = (m: ProgressMetric) => ({
        current: roundTenth(m.current),
        target: m.target,
        percentage: roundTenth(m.percentage),
    });
    const json: Record<string, unknown> = {
        total_hours: metric(report.totalHours),
        direct_hours: metric(report.directHours),
        months: {
            current: report.months.current,
            target: report.months.target,
            percentage: roundTenth(report.months.percentage),
        },
        weekly_average: metric(report.weeklyAverage),
        weeks_logged: report.weeksLogged,
        start_date: report.startDate,
    };
    if (report.latestWeekStart && report.latestWeekEnd) {
        json.latest_week_start = report.latestWeekStart;
        json.latest_week_end = report.latestWeekEnd;
    }
    return json;
}
