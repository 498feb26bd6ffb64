import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { TrackerConfig } from '../types/config';
import { describeError, HoursError } from './errors';
import { ensureDir, ledgerPath } from './fsHelper';
import { debug } from './logger';
import { isIsoDate, isWeekStart } from './weekHelper';

export const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_CONFIG: TrackerConfig = {
    data: { directory: '~/.hours' },
    git: { remote: 'origin', autoPush: true },
    licensure: {
        startDate: '2025-01-28',
        totalHoursTarget: 3000,
        directHoursTarget: 1200,
        minMonths: 24,
        minWeeklyAverage: 15,
    },
};

const configSchema = z.object({
    data: z.object({
        directory: z.string().min(1),
    }),
    git: z.object({
        remote: z.string().min(1),
        autoPush: z.boolean(),
    }),
    licensure: z.object({
        startDate: z
            .string()
            .refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' })
            .refine(isWeekStart, { message: 'must be a Tuesday' }),
        totalHoursTarget: z.number().int().min(0),
        directHoursTarget: z.number().int().min(0),
        minMonths: z.number().int().min(0),
        minWeeklyAverage: z.number().min(0),
    }),
});

type Env = Record<string, string | undefined>;

export function configDir(env: Env = process.env): string {
    return env.HOURS_CONFIG_DIR || path.join(os.homedir(), '.config', 'hours');
}

export function configPath(env: Env = process.env): string {
    return path.join(configDir(env), CONFIG_FILE_NAME);
}

export function isGitDisabled(noGitFlag: boolean, env: Env = process.env): boolean {
    return noGitFlag || env.HOURS_NO_GIT === '1';
}

/**
 * Expands a leading `~` to the current user's home directory.
 */
export function expandTilde(dir: string): string {
    if (dir === '~') {
        return os.homedir();
    }
    if (dir.startsWith('~/')) {
        return path.join(os.homedir(), dir.slice(2));
    }
    return dir;
}

/**
 * Reads and validates a config file, then applies environment overrides.
 */
export function loadConfigFrom(filePath: string, env: Env = process.env): TrackerConfig {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
        throw new HoursError('IoError', `Failed to read "${filePath}": ${describeError(err)}`, { cause: err });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new HoursError('ConfigError', `Failed to parse "${filePath}": ${describeError(err)}`, { cause: err });
    }

    const parsed = configSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? issue.path.join('.') : 'config';
        throw new HoursError(
            'ConfigError',
            `Invalid configuration in "${filePath}": ${where} ${issue?.message ?? 'is invalid'}`,
            { cause: parsed.error }
        );
    }

    const config: TrackerConfig = parsed.data;
    if (env.HOURS_DATA_DIR) {
        config.data.directory = env.HOURS_DATA_DIR;
    }
    if (env.HOURS_NO_GIT === '1') {
        config.git.autoPush = false;
    }
    config.data.directory = expandTilde(config.data.directory);
    return config;
}

export function loadConfig(env: Env = process.env): TrackerConfig {
    const filePath = configPath(env);
    if (!fs.existsSync(filePath)) {
        throw new HoursError('ConfigError', 'Configuration not found. Run `hours init` to set up.');
    }
    debug(`using config ${filePath}`);
    return loadConfigFrom(filePath, env);
}

export function saveConfig(filePath: string, config: TrackerConfig): void {
    try {
        ensureDir(path.dirname(filePath));
        fs.writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    } catch (err) {
        throw new HoursError('IoError', `Failed to write config to "${filePath}": ${describeError(err)}`, { cause: err });
    }
}

export function dataFile(config: TrackerConfig): string {
    return ledgerPath(config.data.directory);
}
