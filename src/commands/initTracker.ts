import type { CommandContext } from '../types/context';
import type { TrackerConfig } from '../types/config';
import { configPath, DEFAULT_CONFIG, expandTilde, saveConfig } from '../utils/configHelper';
import { HoursError } from '../utils/errors';
import { ensureDir, fileExists, ledgerPath, saveLedger } from '../utils/fsHelper';
import { gitInitAndCommit } from '../utils/gitHelper';
import { emptyLedger } from '../utils/ledgerHelper';
import { inputText, inputWeekStartDate, required } from '../utils/promptHelper';
import { isWeekStart, parseIsoDate } from '../utils/weekHelper';

export interface InitTrackerOptions {
    dataDir?: string;
    /** Git remote URL added to the data repository. */
    remote?: string;
    startDate?: string;
    nonInteractive?: boolean;
}

function checkStartDate(startDate: string): string {
    parseIsoDate(startDate);
    if (!isWeekStart(startDate)) {
        throw new HoursError('InvalidDate', `Start date must be a Tuesday, got ${startDate}`);
    }
    return startDate;
}

/**
 * Handler for `hours init`: writes config.json, creates the data directory
 * with an empty ledger and sets up its git repository.
 */
export async function initTracker(context: CommandContext, options: InitTrackerOptions): Promise<void> {
    let dataDir: string;
    let remote: string | undefined;
    let startDate: string;

    if (options.nonInteractive) {
        dataDir = options.dataDir ?? DEFAULT_CONFIG.data.directory;
        remote = options.remote;
        startDate = checkStartDate(options.startDate ?? DEFAULT_CONFIG.licensure.startDate);
    } else {
        dataDir = required(await inputText('Data directory', options.dataDir ?? DEFAULT_CONFIG.data.directory));
        const answer = required(await inputText('Git remote URL (leave empty to skip)', options.remote ?? ''));
        remote = answer.trim() || undefined;
        startDate = required(
            await inputWeekStartDate('Licensure start date', options.startDate ?? DEFAULT_CONFIG.licensure.startDate)
        );
    }

    const config: TrackerConfig = {
        data: { directory: dataDir },
        git: { ...DEFAULT_CONFIG.git },
        licensure: { ...DEFAULT_CONFIG.licensure, startDate },
    };
    const filePath = configPath(context.env);
    saveConfig(filePath, config);

    const resolvedDir = expandTilde(dataDir);
    ensureDir(resolvedDir);
    const ledger = ledgerPath(resolvedDir);
    if (!fileExists(ledger)) {
        saveLedger(ledger, emptyLedger());
    }

    gitInitAndCommit(resolvedDir, config.git, remote, context.noGit);

    console.log(`Config written to ${filePath}`);
    console.log(`Initialized hours tracking in ${resolvedDir}`);
}
