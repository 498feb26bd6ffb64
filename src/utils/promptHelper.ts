import { input, select } from '@inquirer/prompts';
import { CATEGORIES } from '../types/hoursData';
import type { Category, HoursData, IsoDate, WeekRange } from '../types/hoursData';
import { HoursError } from './errors';
import { CATEGORY_LABELS, findWeek, weekTotal } from './ledgerHelper';
import { formatWeekLabel, isIsoDate, isWeekStart } from './weekHelper';

/**
 * Inquirer rejects with ExitPromptError on Ctrl-C; treat that as a cancel
 * and let anything else propagate.
 */
async function orCancel<T>(prompt: Promise<T>): Promise<T | undefined> {
    try {
        return await prompt;
    } catch (err) {
        if (err instanceof Error && err.name === 'ExitPromptError') {
            return undefined;
        }
        throw err;
    }
}

/**
 * Unwraps a prompt answer, aborting the command when the user cancelled.
 */
export function required<T>(value: T | undefined): T {
    if (value === undefined) {
        throw new Error('Cancelled');
    }
    return value;
}

export function validateHoursInput(raw: string): true | string {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
        return 'Invalid number. Try again.';
    }
    if (value < 0) {
        return 'Hours must be >= 0. Try again.';
    }
    return true;
}

export function weekChoiceLabel(week: WeekRange, data: HoursData, isCurrent: boolean): string {
    const entry = findWeek(data, week.start);
    const total = entry ? weekTotal(entry) : 0;
    return `${formatWeekLabel(week)}${isCurrent ? ' (current)' : ''}    ${total.toFixed(1)} hrs`;
}

/**
 * Lets the user pick a week, newest first, with the current week preselected.
 */
export async function selectWeek(
    weeks: WeekRange[],
    data: HoursData,
    currentStart: IsoDate
): Promise<IsoDate | undefined> {
    if (weeks.length === 0) {
        throw new HoursError('InvalidDate', 'No weeks to select from. Check the licensure start date.');
    }
    const choices = [...weeks].reverse().map(week => ({
        name: weekChoiceLabel(week, data, week.start === currentStart),
        value: week.start,
    }));
    return orCancel(select({ message: 'Select week:', choices, default: currentStart }));
}

export async function selectCategory(): Promise<Category | undefined> {
    const choices = CATEGORIES.map(category => ({
        name: CATEGORY_LABELS[category].long,
        value: category,
    }));
    return orCancel(select<Category>({ message: 'Select category:', choices }));
}

/**
 * Asks for a non-negative number of hours. When `current` is given, an empty
 * answer returns it unchanged; the rounded value is only shown in the message.
 */
export async function inputHours(message: string, current?: number): Promise<number | undefined> {
    const answer = await orCancel(
        input({
            message: current === undefined ? message : `${message} [${current.toFixed(1)}]`,
            validate: raw => (current !== undefined && raw.trim() === '' ? true : validateHoursInput(raw)),
        })
    );
    if (answer === undefined) {
        return undefined;
    }
    return answer.trim() === '' && current !== undefined ? current : Number(answer.trim());
}

export async function inputText(message: string, fallback?: string): Promise<string | undefined> {
    return orCancel(input({ message, default: fallback }));
}

export async function inputWeekStartDate(message: string, fallback?: IsoDate): Promise<IsoDate | undefined> {
    return orCancel(
        input({
            message: `${message} (YYYY-MM-DD)`,
            default: fallback,
            validate: value => {
                if (!isIsoDate(value.trim())) {
                    return 'Invalid date format. Use YYYY-MM-DD.';
                }
                return isWeekStart(value.trim()) ? true : 'Date must be a Tuesday. Try again.';
            },
        })
    ).then(answer => answer?.trim());
}
