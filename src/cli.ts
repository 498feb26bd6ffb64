#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { editWeek } from './commands/editWeek';
import { exportReport } from './commands/exportReport';
import { initTracker } from './commands/initTracker';
import { listWeeks } from './commands/listWeeks';
import { logHours } from './commands/logHours';
import { showSummary } from './commands/showSummary';
import type { CommandContext } from './types/context';
import type { Category } from './types/hoursData';
import { isGitDisabled } from './utils/configHelper';
import { describeError } from './utils/errors';
import { debug } from './utils/logger';
import { todayIso } from './utils/weekHelper';

type Env = Record<string, string | undefined>;

type GlobalOptions = {
    /** commander stores --no-git as git: false. */
    git: boolean;
};

type AddCliOptions = GlobalOptions & {
    week?: string;
    category?: string;
    hours?: number;
    nonInteractive?: boolean;
};

type EditCliOptions = GlobalOptions & {
    week?: string;
    individualSupervision?: number;
    groupSupervision?: number;
    direct?: number;
    indirect?: number;
    nonInteractive?: boolean;
};

type InitCliOptions = GlobalOptions & {
    dataDir?: string;
    remote?: string;
    startDate?: string;
    nonInteractive?: boolean;
};

export function parseHoursArg(value: string): number {
    const hours = Number(value);
    if (value.trim() === '' || !Number.isFinite(hours)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return hours;
}

export function parseCountArg(value: string): number {
    const count = Number(value);
    if (!Number.isInteger(count) || count < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return count;
}

/**
 * Builds the `hours` program. Each command gets a fresh CommandContext
 * resolved from `env` and `today`.
 */
export function buildProgram(env: Env = process.env, today: string = todayIso()): Command {
    const program = new Command();
    const contextFor = (options: GlobalOptions): CommandContext => ({
        env,
        today,
        noGit: isGitDisabled(options.git === false, env),
    });

    program
        .name('hours')
        .description('Track counseling licensure hours')
        .option('--no-git', 'Disable git operations');

    // Command: init
    program
        .command('init')
        .description('Create the config file and data directory')
        .option('--data-dir <dir>', 'Path to data directory')
        .option('--remote <url>', 'Git remote URL')
        .option('--start-date <date>', 'Licensure start date (YYYY-MM-DD, must be a Tuesday)')
        .option('--non-interactive', 'Run without interactive prompts')
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<InitCliOptions>();
            await initTracker(contextFor(options), options);
        });

    // Command: add
    program
        .command('add')
        .description('Add hours to one category of a week')
        .option('--week <date>', 'Tuesday start date of the week (YYYY-MM-DD)')
        .option('--category <category>', 'Hour category')
        .option('--hours <hours>', 'Number of hours to add', parseHoursArg)
        .option('--non-interactive', 'Run without interactive prompts')
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<AddCliOptions>();
            await logHours(contextFor(options), options);
        });

    // Command: edit
    program
        .command('edit')
        .description('Overwrite the hours recorded for a week')
        .option('--week <date>', 'Tuesday start date of the week (YYYY-MM-DD)')
        .option('--individual-supervision <hours>', 'Individual supervision hours', parseHoursArg)
        .option('--group-supervision <hours>', 'Group supervision hours', parseHoursArg)
        .option('--direct <hours>', 'Direct client contact hours', parseHoursArg)
        .option('--indirect <hours>', 'Indirect hours', parseHoursArg)
        .option('--non-interactive', 'Run without interactive prompts')
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<EditCliOptions>();
            const values: Partial<Record<Category, number>> = {
                individual_supervision: options.individualSupervision,
                group_supervision: options.groupSupervision,
                direct: options.direct,
                indirect: options.indirect,
            };
            await editWeek(contextFor(options), {
                week: options.week,
                values,
                nonInteractive: options.nonInteractive,
            });
        });

    // Command: list
    program
        .command('list')
        .description('Show recorded weeks')
        .option('--json', 'Output as JSON')
        .option('--last <n>', 'Show only the last N weeks', parseCountArg)
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<GlobalOptions & { json?: boolean; last?: number }>();
            await listWeeks(contextFor(options), options);
        });

    // Command: summary
    program
        .command('summary')
        .description('Show progress toward licensure targets')
        .option('--json', 'Output as JSON')
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<GlobalOptions & { json?: boolean }>();
            await showSummary(contextFor(options), options);
        });

    // Command: export
    program
        .command('export')
        .description('Generate a PDF report')
        .option('--output <path>', 'Override output file path')
        .option('--open', 'Open the PDF after generation')
        .action(async (_options: unknown, command: Command) => {
            const options = command.optsWithGlobals<GlobalOptions & { output?: string; open?: boolean }>();
            await exportReport(contextFor(options), options);
        });

    return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
    try {
        await buildProgram().parseAsync(argv);
    } catch (err) {
        console.error(`Error: ${describeError(err)}`);
        if (err instanceof Error && err.stack) {
            debug(err.stack);
        }
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}
