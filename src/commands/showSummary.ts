import type { CommandContext } from '../types/context';
import { dataFile, loadConfig } from '../utils/configHelper';
import { loadLedger } from '../utils/fsHelper';
import { calculateProgress, progressToJson, roundTenth } from '../utils/progressHelper';
import type { ProgressReport } from '../utils/progressHelper';
import { formatLongDate } from '../utils/weekHelper';

export interface ShowSummaryOptions {
    json?: boolean;
}

const fixed1 = (value: number): string => roundTenth(value).toFixed(1);

/**
 * Text block printed by `hours summary`.
 */
export function formatSummary(report: ProgressReport): string[] {
    const { totalHours, directHours, months, weeklyAverage } = report;
    const lines = [
        'Licensure Progress',
        '═'.repeat(50),
        '',
        `Total supervised hours: ${fixed1(totalHours.current).padStart(8)} / ${String(totalHours.target).padEnd(6)} (${fixed1(totalHours.percentage).padStart(5)}%)`,
        `Direct client hours:   ${fixed1(directHours.current).padStart(8)} / ${String(directHours.target).padEnd(6)} (${fixed1(directHours.percentage).padStart(5)}%)`,
        `Months of experience:  ${String(months.current).padStart(8)}   / ${String(months.target).padStart(4)}   (${fixed1(months.percentage).padStart(5)}%)`,
        `Weekly average:        ${fixed1(weeklyAverage.current).padStart(8)} / ${fixed1(weeklyAverage.target).padStart(6)} (${fixed1(weeklyAverage.percentage).padStart(5)}%)`,
        '',
        `Weeks logged: ${report.weeksLogged}`,
    ];
    if (report.firstWeekStart && report.latestWeekEnd) {
        lines.push(`Date range: ${formatLongDate(report.firstWeekStart)} – ${formatLongDate(report.latestWeekEnd)}`);
    }
    return lines;
}

/**
 * Handler for `hours summary`.
 */
export async function showSummary(context: CommandContext, options: ShowSummaryOptions): Promise<void> {
    const config = loadConfig(context.env);
    const data = loadLedger(dataFile(config));
    const report = calculateProgress(data, config.licensure, context.today);

    if (options.json) {
        console.log(JSON.stringify(progressToJson(report), null, 2));
        return;
    }
    for (const line of formatSummary(report)) {
        console.log(line);
    }
}
