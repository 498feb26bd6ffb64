import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { editWeek } from '../commands/editWeek';
import { exportReport } from '../commands/exportReport';
import { initTracker } from '../commands/initTracker';
import { formatTable, listWeeks } from '../commands/listWeeks';
import { logHours } from '../commands/logHours';
import { showSummary } from '../commands/showSummary';
import type { CommandContext } from '../types/context';
import type { HoursData } from '../types/hoursData';
import { configPath, DEFAULT_CONFIG, saveConfig } from '../utils/configHelper';
import { loadLedger, saveLedger } from '../utils/fsHelper';

describe('commands', () => {
    let root: string;
    let dataDir: string;
    let ledgerFile: string;
    let context: CommandContext;

    const printed = (spy: { mock: { calls: unknown[][] } }): string[] => spy.mock.calls.map(call => String(call[0]));

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'hours-cmd-'));
        dataDir = path.join(root, 'data');
        fs.mkdirSync(dataDir);
        ledgerFile = path.join(dataDir, 'hours.json');
        context = { env: { HOURS_CONFIG_DIR: path.join(root, 'config') }, today: '2025-02-12', noGit: true };
        saveConfig(configPath(context.env), { ...DEFAULT_CONFIG, data: { directory: dataDir } });
        saveLedger(ledgerFile, { weeks: [] });
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    describe('logHours', () => {
        it('adds to the current week by default', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { category: 'direct', hours: 3.5, nonInteractive: true });

            expect(loadLedger(ledgerFile).weeks).toEqual([
                {
                    start: '2025-02-11',
                    end: '2025-02-17',
                    individual_supervision: 0,
                    group_supervision: 0,
                    direct: 3.5,
                    indirect: 0,
                },
            ]);
            expect(printed(log)).toEqual(['Added 3.5 direct hours for week of 2025-02-11']);
        });

        it('accumulates into an existing week', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 2, nonInteractive: true });
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 3.5, nonInteractive: true });

            const weeks = loadLedger(ledgerFile).weeks;
            expect(weeks).toHaveLength(1);
            expect(weeks[0].direct).toBe(5.5);
        });

        it('keeps weeks sorted on disk', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-02-11', category: 'indirect', hours: 2, nonInteractive: true });
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 7, nonInteractive: true });
            await logHours(context, { week: '2025-02-04', category: 'direct', hours: 1, nonInteractive: true });

            expect(loadLedger(ledgerFile).weeks.map(w => w.start)).toEqual(['2025-01-28', '2025-02-04', '2025-02-11']);
        });

        it('rejects a week that does not start on Tuesday', async () => {
            await expect(
                logHours(context, { week: '2025-01-29', category: 'direct', hours: 1, nonInteractive: true })
            ).rejects.toMatchObject({ code: 'InvalidDate' });
            expect(loadLedger(ledgerFile).weeks).toEqual([]);
        });

        it('rejects negative hours', async () => {
            await expect(
                logHours(context, { category: 'direct', hours: -1, nonInteractive: true })
            ).rejects.toMatchObject({ code: 'InvalidHours', message: 'Hours must be >= 0, got -1' });
        });

        it('rejects an unknown category', async () => {
            await expect(
                logHours(context, { category: 'supervision', hours: 1, nonInteractive: true })
            ).rejects.toMatchObject({ code: 'InvalidCategory' });
        });

        it('requires a category and hours without prompts', async () => {
            await expect(logHours(context, { hours: 1, nonInteractive: true })).rejects.toThrow(
                '--category is required in non-interactive mode'
            );
            await expect(logHours(context, { category: 'direct', nonInteractive: true })).rejects.toThrow(
                '--hours is required in non-interactive mode'
            );
        });
    });

    describe('editWeek', () => {
        it('overwrites only the given categories', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 10, nonInteractive: true });
            await editWeek(context, {
                week: '2025-01-28',
                values: { individual_supervision: 1, indirect: 4 },
                nonInteractive: true,
            });

            expect(loadLedger(ledgerFile).weeks[0]).toMatchObject({
                individual_supervision: 1,
                group_supervision: 0,
                direct: 10,
                indirect: 4,
            });
            expect(printed(log)).toContain('Edited hours for week of 2025-01-28');
        });

        it('creates the week when it does not exist yet', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await editWeek(context, { values: { group_supervision: 2 }, nonInteractive: true });
            expect(loadLedger(ledgerFile).weeks).toEqual([
                {
                    start: '2025-02-11',
                    end: '2025-02-17',
                    individual_supervision: 0,
                    group_supervision: 2,
                    direct: 0,
                    indirect: 0,
                },
            ]);
        });

        it('saves nothing when any value is negative', async () => {
            await expect(
                editWeek(context, { week: '2025-01-28', values: { direct: 3, indirect: -2 }, nonInteractive: true })
            ).rejects.toMatchObject({ code: 'InvalidHours' });
            expect(loadLedger(ledgerFile).weeks).toEqual([]);
        });
    });

    describe('listWeeks', () => {
        const data: HoursData = {
            weeks: [
                { start: '2025-01-28', end: '2025-02-03', individual_supervision: 0, group_supervision: 0, direct: 5, indirect: 0 },
                { start: '2025-02-04', end: '2025-02-10', individual_supervision: 1, group_supervision: 0, direct: 0, indirect: 0 },
                { start: '2025-02-11', end: '2025-02-17', individual_supervision: 0, group_supervision: 2, direct: 0, indirect: 0.5 },
            ],
        };

        it('explains an empty ledger', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await listWeeks(context, {});
            await listWeeks(context, { json: true });
            expect(printed(log)).toEqual(['No hours logged yet. Use `hours add` to start tracking.', '[]']);
        });

        it('prints the last N weeks as JSON with totals', async () => {
            saveLedger(ledgerFile, data);
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await listWeeks(context, { json: true, last: 2 });

            const json: unknown = JSON.parse(printed(log)[0]);
            expect(json).toEqual([
                { ...data.weeks[1], total: 1 },
                { ...data.weeks[2], total: 2.5 },
            ]);
        });

        it('prints every week when N exceeds the ledger', async () => {
            saveLedger(ledgerFile, data);
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await listWeeks(context, { json: true, last: 10 });
            expect(JSON.parse(printed(log)[0])).toHaveLength(3);
        });

        it('ends the table with a totals row', async () => {
            saveLedger(ledgerFile, data);
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await listWeeks(context, {});

            const lines = printed(log)[0].split('\n');
            expect(lines).toHaveLength(7);
            expect(lines[2].startsWith('Jan 28 – Feb 03, 2025')).toBe(true);
            expect(lines[6].split(/\s+/)).toEqual(['TOTALS', '1.0', '2.0', '5.0', '0.5', '8.5']);
        });
    });

    describe('showSummary', () => {
        it('prints progress as JSON', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 10, nonInteractive: true });
            await logHours(context, { week: '2025-01-28', category: 'indirect', hours: 5, nonInteractive: true });
            await logHours(context, { week: '2025-02-04', category: 'direct', hours: 8, nonInteractive: true });

            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await showSummary(context, { json: true });

            const json: unknown = JSON.parse(printed(log)[0]);
            expect(json).toMatchObject({
                total_hours: { current: 23, target: 3000 },
                direct_hours: { current: 18, target: 1200 },
                weeks_logged: 2,
                start_date: '2025-01-28',
                latest_week_start: '2025-02-04',
            });
        });

        it('prints a text block for an empty ledger', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await showSummary(context, {});

            const lines = printed(log);
            expect(lines[0]).toBe('Licensure Progress');
            expect(lines[3]).toBe('Total supervised hours:      0.0 / 3000   (  0.0%)');
            expect(lines[lines.length - 1]).toBe('Weeks logged: 0');
        });

        it('reads the ledger from HOURS_DATA_DIR', async () => {
            const other = path.join(root, 'other');
            fs.mkdirSync(other);
            fs.writeFileSync(
                path.join(other, 'hours.json'),
                '{"weeks":[{"start":"2025-01-28","end":"2025-02-03","individual_supervision":0.0,"group_supervision":0.0,"direct":99.0,"indirect":0.0}]}'
            );
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await showSummary({ ...context, env: { ...context.env, HOURS_DATA_DIR: other } }, { json: true });
            expect(JSON.parse(printed(log)[0])).toMatchObject({ direct_hours: { current: 99 } });
        });
    });

    describe('exportReport', () => {
        it('writes a PDF under exports/ by default', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 5, nonInteractive: true });
            await exportReport(context, {});

            const pdf = path.join(dataDir, 'exports', 'hours-report-2025-02-12.pdf');
            expect(fs.readFileSync(pdf).subarray(0, 5).toString('latin1')).toBe('%PDF-');
        });

        it('honours --output and creates missing directories', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            const output = path.join(root, 'reports', 'nested', 'custom-report.pdf');
            await exportReport(context, { output });

            expect(fs.statSync(output).size).toBeGreaterThan(0);
            expect(printed(log)).toEqual([`Report saved to ${output}`]);
        });
    });

    describe('initTracker', () => {
        it('writes config and an empty ledger', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            const env = { HOURS_CONFIG_DIR: path.join(root, 'fresh-config') };
            const freshData = path.join(root, 'fresh-data');

            await initTracker(
                { ...context, env },
                { dataDir: freshData, startDate: '2025-01-28', remote: 'git@example.com:me/hours.git', nonInteractive: true }
            );

            const config: unknown = JSON.parse(fs.readFileSync(configPath(env), 'utf-8'));
            expect(config).toMatchObject({
                data: { directory: freshData },
                licensure: { startDate: '2025-01-28', totalHoursTarget: 3000 },
            });
            expect(fs.readFileSync(path.join(freshData, 'hours.json'), 'utf-8')).toBe('{\n  "weeks": []\n}\n');
        });

        it('keeps an existing ledger', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await logHours(context, { week: '2025-01-28', category: 'direct', hours: 5, nonInteractive: true });
            await initTracker(context, { dataDir, startDate: '2025-01-28', nonInteractive: true });
            expect(loadLedger(ledgerFile).weeks).toHaveLength(1);
        });

        it('rejects a start date that is not a Tuesday', async () => {
            await expect(
                initTracker(context, { dataDir, startDate: '2025-01-30', nonInteractive: true })
            ).rejects.toMatchObject({ code: 'InvalidDate', message: 'Start date must be a Tuesday, got 2025-01-30' });
        });
    });
});

describe('formatTable', () => {
    it('left-aligns the first column and right-aligns the rest', () => {
        expect(formatTable(['Week', 'Total'], [['a', '1.0']], ['TOTALS', '12.5']).split('\n')).toEqual([
            'Week    Total',
            '──────  ─────',
            'a         1.0',
            '──────  ─────',
            'TOTALS   12.5',
        ]);
    });
});
