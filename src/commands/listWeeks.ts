import type { CommandContext } from '../types/context';
import { CATEGORIES } from '../types/hoursData';
import type { WeekEntry } from '../types/hoursData';
import { dataFile, loadConfig } from '../utils/configHelper';
import { loadLedger } from '../utils/fsHelper';
import { CATEGORY_LABELS, categoryTotals, weekTotal } from '../utils/ledgerHelper';
import { roundTenth } from '../utils/progressHelper';
import { formatWeekLabel } from '../utils/weekHelper';

export interface ListWeeksOptions {
    json?: boolean;
    /** Only the most recent N weeks. */
    last?: number;
}

const fixed1 = (value: number): string => roundTenth(value).toFixed(1);

/**
 * Lays rows out in aligned columns: first column left-aligned, the rest
 * right-aligned, with rules under the header and above the footer.
 */
export function formatTable(header: string[], rows: string[][], footer: string[]): string {
    const all = [header, ...rows, footer];
    const widths = header.map((_, col) => Math.max(...all.map(row => row[col].length)));
    const line = (row: string[]) =>
        row.map((cell, col) => (col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]))).join('  ');
    const rule = widths.map(w => '─'.repeat(w)).join('  ');
    return [line(header), rule, ...rows.map(line), rule, line(footer)].join('\n');
}

export function weeksToJson(weeks: readonly WeekEntry[]): Array<WeekEntry & { total: number }> {
    return weeks.map(w => ({
        start: w.start,
        end: w.end,
        individual_supervision: w.individual_supervision,
        group_supervision: w.group_supervision,
        direct: w.direct,
        indirect: w.indirect,
        total: weekTotal(w),
    }));
}

/**
 * Handler for `hours list`.
 */
export async function listWeeks(context: CommandContext, options: ListWeeksOptions): Promise<void> {
    const config = loadConfig(context.env);
    const data = loadLedger(dataFile(config));

    if (data.weeks.length === 0) {
        console.log(options.json ? '[]' : 'No hours logged yet. Use `hours add` to start tracking.');
        return;
    }

    const weeks =
        options.last === undefined ? data.weeks : data.weeks.slice(Math.max(data.weeks.length - options.last, 0));

    if (options.json) {
        console.log(JSON.stringify(weeksToJson(weeks), null, 2));
        return;
    }

    const header = ['Week', ...CATEGORIES.map(c => CATEGORY_LABELS[c].short), 'Total'];
    const rows = weeks.map(w => [formatWeekLabel(w), ...CATEGORIES.map(c => fixed1(w[c])), fixed1(weekTotal(w))]);
    const totals = categoryTotals(weeks);
    const grandTotal = CATEGORIES.reduce((sum, c) => sum + totals[c], 0);
    const footer = ['TOTALS', ...CATEGORIES.map(c => fixed1(totals[c])), fixed1(grandTotal)];

    console.log(formatTable(header, rows, footer));
}
