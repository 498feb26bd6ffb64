import type { CommandContext } from '../types/context';
import type { Category } from '../types/hoursData';
import { dataFile, loadConfig } from '../utils/configHelper';
import { HoursError } from '../utils/errors';
import { loadLedger, saveLedger } from '../utils/fsHelper';
import { syncOrWarn } from '../utils/gitHelper';
import { addHours, getOrCreateWeek, parseCategory } from '../utils/ledgerHelper';
import { inputHours, required, selectCategory, selectWeek } from '../utils/promptHelper';
import { allWeeks, currentWeek, resolveWeekStart } from '../utils/weekHelper';

export interface LogHoursOptions {
    /** Tuesday opening the target week; defaults to the current week. */
    week?: string;
    category?: string;
    hours?: number;
    nonInteractive?: boolean;
}

/**
 * Handler for `hours add`: accumulates hours into one category of one week.
 */
export async function logHours(context: CommandContext, options: LogHoursOptions): Promise<void> {
    // 1. Load config and the current ledger
    const config = loadConfig(context.env);
    const filePath = dataFile(config);
    const data = loadLedger(filePath);

    // 2. Resolve week, category and hours
    let weekStart: string;
    let category: Category;
    let hours: number;

    if (options.nonInteractive) {
        weekStart = resolveWeekStart(options.week, context.today);
        if (options.category === undefined) {
            throw new HoursError('InvalidCategory', '--category is required in non-interactive mode');
        }
        category = parseCategory(options.category);
        if (options.hours === undefined) {
            throw new HoursError('InvalidHours', '--hours is required in non-interactive mode');
        }
        if (options.hours < 0) {
            throw new HoursError('InvalidHours', `Hours must be >= 0, got ${options.hours}`);
        }
        hours = options.hours;
    } else {
        const weeks = allWeeks(config.licensure.startDate, context.today);
        weekStart = required(await selectWeek(weeks, data, currentWeek(context.today).start));
        category = required(await selectCategory());
        hours = required(await inputHours(`Hours to add (${category})`));
    }

    // 3. Apply and persist
    addHours(getOrCreateWeek(data, weekStart), category, hours);
    saveLedger(filePath, data);

    console.log(`Added ${hours.toFixed(1)} ${category} hours for week of ${weekStart}`);

    // 4. Sync
    syncOrWarn(
        config.data.directory,
        config.git,
        `Add ${hours} ${category} hours for week of ${weekStart}`,
        context.noGit
    );
}
