import type { CommandContext } from '../types/context';
import { CATEGORIES } from '../types/hoursData';
import type { Category } from '../types/hoursData';
import { dataFile, loadConfig } from '../utils/configHelper';
import { HoursError } from '../utils/errors';
import { loadLedger, saveLedger } from '../utils/fsHelper';
import { syncOrWarn } from '../utils/gitHelper';
import { CATEGORY_LABELS, getHours, getOrCreateWeek, setHours } from '../utils/ledgerHelper';
import { inputHours, required, selectWeek } from '../utils/promptHelper';
import { allWeeks, currentWeek, resolveWeekStart } from '../utils/weekHelper';

export interface EditWeekOptions {
    week?: string;
    /** Replacement values; categories left out keep their current value. */
    values: Partial<Record<Category, number>>;
    nonInteractive?: boolean;
}

/**
 * Handler for `hours edit`: overwrites category values for one week.
 */
export async function editWeek(context: CommandContext, options: EditWeekOptions): Promise<void> {
    const config = loadConfig(context.env);
    const filePath = dataFile(config);
    const data = loadLedger(filePath);

    let weekStart: string;

    if (options.nonInteractive) {
        weekStart = resolveWeekStart(options.week, context.today);
        const entry = getOrCreateWeek(data, weekStart);
        for (const category of CATEGORIES) {
            const value = options.values[category];
            if (value === undefined) {
                continue;
            }
            if (value < 0) {
                throw new HoursError('InvalidHours', 'Hours must be >= 0');
            }
            setHours(entry, category, value);
        }
    } else {
        const weeks = allWeeks(config.licensure.startDate, context.today);
        weekStart = required(await selectWeek(weeks, data, currentWeek(context.today).start));
        const entry = getOrCreateWeek(data, weekStart);
        for (const category of CATEGORIES) {
            // A skipped prompt keeps the stored value.
            const value = await inputHours(CATEGORY_LABELS[category].long, getHours(entry, category));
            if (value !== undefined) {
                setHours(entry, category, value);
            }
        }
    }

    saveLedger(filePath, data);
    console.log(`Edited hours for week of ${weekStart}`);

    syncOrWarn(config.data.directory, config.git, `Edit hours for week of ${weekStart}`, context.noGit);
}
