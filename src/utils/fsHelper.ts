import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CATEGORIES } from '../types/hoursData';
import type { HoursData, WeekEntry } from '../types/hoursData';
import { describeError, HoursError } from './errors';
import { debug } from './logger';
import { cloneLedger } from './ledgerHelper';
import { addDaysIso, isIsoDate, isWeekStart } from './weekHelper';

export const DATA_FILE_NAME = 'hours.json';

const isoDate = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });

const weekEntrySchema = z.object({
    start: isoDate,
    end: isoDate,
    individual_supervision: z.number(),
    group_supervision: z.number(),
    direct: z.number(),
    indirect: z.number(),
});

const hoursDataSchema = z.object({
    weeks: z.array(weekEntrySchema),
});

export type LedgerValidation =
    | { ok: true; data: HoursData }
    | { ok: false; error: HoursError };

/**
 * Ensures a directory exists, creating it (and any parent directories) if needed.
 */
export function ensureDir(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Returns true if the given file exists.
 */
export function fileExists(filePath: string): boolean {
    return fs.existsSync(filePath);
}

/**
 * Resolves hours.json inside a data directory.
 */
export function ledgerPath(dataDir: string): string {
    return path.join(dataDir, DATA_FILE_NAME);
}

/**
 * Decodes a ledger from its JSON text. Only the shape is checked here: a
 * hand-edited file with a non-Tuesday start or negative hours still loads.
 */
export function parseLedger(raw: string, source = 'ledger'): HoursData {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new HoursError('ParseError', `Failed to parse "${source}": ${describeError(err)}`, { cause: err });
    }
    const parsed = hoursDataSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new HoursError(
            'ParseError',
            `Failed to parse "${source}": ${issue?.message ?? 'invalid ledger'}${where}`,
            { cause: parsed.error }
        );
    }
    return parsed.data;
}

/**
 * Reads the ledger file.
 */
export function loadLedger(filePath: string): HoursData {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
        throw new HoursError('IoError', `Failed to read "${filePath}": ${describeError(err)}`, { cause: err });
    }
    debug(`loaded ${filePath}`);
    return parseLedger(raw, filePath);
}

function validateEntry(entry: WeekEntry): HoursError | undefined {
    if (!isIsoDate(entry.start) || !isWeekStart(entry.start)) {
        return new HoursError('InvalidWeekStart', `Week start ${entry.start} is not a Tuesday`);
    }
    const expectedEnd = addDaysIso(entry.start, 6);
    if (entry.end !== expectedEnd) {
        return new HoursError(
            'InvalidWeekEnd',
            `Week end ${entry.end} does not match expected ${expectedEnd} (start + 6 days)`
        );
    }
    const values = CATEGORIES.map(category => entry[category]);
    if (values.some(value => !Number.isFinite(value))) {
        return new HoursError('InvalidHours', `Non-finite hour values in week starting ${entry.start}`);
    }
    if (values.some(value => value < 0)) {
        return new HoursError('NegativeHours', `Negative hour values in week starting ${entry.start}`);
    }
    return undefined;
}

/**
 * Checks every invariant a saved ledger must satisfy and returns a sorted
 * copy. The input is never modified.
 */
export function validateLedger(data: HoursData): LedgerValidation {
    const copy = cloneLedger(data);

    for (const entry of copy.weeks) {
        const error = validateEntry(entry);
        if (error) {
            return { ok: false, error };
        }
    }

    copy.weeks.sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));

    for (let i = 1; i < copy.weeks.length; i++) {
        if (copy.weeks[i].start === copy.weeks[i - 1].start) {
            return {
                ok: false,
                error: new HoursError('DuplicateWeek', `Duplicate week starting ${copy.weeks[i].start}`),
            };
        }
    }

    return { ok: true, data: copy };
}

export function serializeLedger(data: HoursData): string {
    return JSON.stringify(data, null, 2) + '\n';
}

/**
 * Validates, sorts and writes the ledger.
 *
 * The JSON goes to a `.tmp` sibling first, is fsynced, then renamed over the
 * target, so the target is either the old file or the complete new one.
 */
export function saveLedger(filePath: string, data: HoursData): void {
    const result = validateLedger(data);
    if (!result.ok) {
        throw result.error;
    }

    const json = serializeLedger(result.data);
    const tmpPath = `${filePath}.tmp`;

    try {
        const fd = fs.openSync(tmpPath, 'w');
        try {
            fs.writeSync(fd, json);
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
        fs.renameSync(tmpPath, filePath);
    } catch (err) {
        fs.rmSync(tmpPath, { force: true });
        throw new HoursError('IoError', `Failed to write "${filePath}": ${describeError(err)}`, { cause: err });
    }
    debug(`saved ${filePath} (${result.data.weeks.length} weeks)`);
}
