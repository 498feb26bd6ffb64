import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildProgram, parseCountArg, parseHoursArg } from '../cli';
import { configPath, DEFAULT_CONFIG, saveConfig } from '../utils/configHelper';
import { loadLedger, saveLedger } from '../utils/fsHelper';

describe('argument parsers', () => {
    it('parses hours, including negatives left for the command to reject', () => {
        expect(parseHoursArg('2.5')).toBe(2.5);
        expect(parseHoursArg('-1')).toBe(-1);
        expect(() => parseHoursArg('two')).toThrow(InvalidArgumentError);
        expect(() => parseHoursArg('')).toThrow(InvalidArgumentError);
        expect(() => parseHoursArg('Infinity')).toThrow(InvalidArgumentError);
        expect(() => parseHoursArg('1e400')).toThrow(InvalidArgumentError);
    });

    it('parses a non-negative week count', () => {
        expect(parseCountArg('3')).toBe(3);
        expect(() => parseCountArg('-2')).toThrow(InvalidArgumentError);
        expect(() => parseCountArg('1.5')).toThrow(InvalidArgumentError);
    });
});

describe('hours program', () => {
    let root: string;
    let env: Record<string, string | undefined>;
    let ledgerFile: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'hours-cli-'));
        env = { HOURS_CONFIG_DIR: root };
        ledgerFile = path.join(root, 'hours.json');
        saveConfig(configPath(env), { ...DEFAULT_CONFIG, data: { directory: root } });
        saveLedger(ledgerFile, { weeks: [] });
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('routes add with its options', async () => {
        await buildProgram(env, '2025-02-12').parseAsync(
            ['--no-git', 'add', '--week', '2025-01-28', '--category', 'direct', '--hours', '5', '--non-interactive'],
            { from: 'user' }
        );
        expect(loadLedger(ledgerFile).weeks[0]).toMatchObject({ start: '2025-01-28', direct: 5 });
    });

    it('maps edit flags onto categories', async () => {
        await buildProgram(env, '2025-02-12').parseAsync(
            ['edit', '--week', '2025-02-04', '--direct', '3.5', '--individual-supervision', '1', '--non-interactive', '--no-git'],
            { from: 'user' }
        );
        expect(loadLedger(ledgerFile).weeks[0]).toEqual({
            start: '2025-02-04',
            end: '2025-02-10',
            individual_supervision: 1,
            group_supervision: 0,
            direct: 3.5,
            indirect: 0,
        });
    });

    it('propagates command failures to the caller', async () => {
        await expect(
            buildProgram(env, '2025-02-12').parseAsync(
                ['--no-git', 'add', '--category', 'direct', '--hours', '-3', '--non-interactive'],
                { from: 'user' }
            )
        ).rejects.toMatchObject({ code: 'InvalidHours' });
    });
});
