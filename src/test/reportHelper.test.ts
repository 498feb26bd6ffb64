import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { LicensureTarget } from '../types/config';
import { addHours, emptyLedger, getOrCreateWeek } from '../utils/ledgerHelper';
import { buildReport, renderReportPdf } from '../utils/reportHelper';
import { addDaysIso } from '../utils/weekHelper';

const target: LicensureTarget = {
    startDate: '2025-01-28',
    totalHoursTarget: 3000,
    directHoursTarget: 1200,
    minMonths: 24,
    minWeeklyAverage: 15,
};

function scenarioLedger() {
    const data = emptyLedger();
    addHours(getOrCreateWeek(data, '2025-01-28'), 'direct', 10);
    addHours(getOrCreateWeek(data, '2025-01-28'), 'indirect', 5);
    addHours(getOrCreateWeek(data, '2025-02-04'), 'direct', 8);
    return data;
}

describe('buildReport', () => {
    it('carries the same figures as the summary', () => {
        const report = buildReport(scenarioLedger(), target, '2025-02-12');
        expect(report.generatedOn).toBe('Feb 12, 2025');
        expect(report.period).toBe('Jan 28, 2025 – Feb 12, 2025');
        expect(report.progress).toEqual([
            { label: 'Total supervised hours', current: '23.0', target: '3000', percentage: '0.8%' },
            { label: 'Direct client hours', current: '18.0', target: '1200', percentage: '1.5%' },
            { label: 'Months of experience', current: '0', target: '24', percentage: '0.0%' },
            { label: 'Weekly average', current: '7.7', target: '15', percentage: '51.1%' },
        ]);
        expect(report.weeksLogged).toBe(2);
    });

    it('has one row per week plus totals', () => {
        const report = buildReport(scenarioLedger(), target, '2025-02-12');
        expect(report.columns).toEqual(['Week', 'Ind Sv', 'Grp Sv', 'Direct', 'Indirect', 'Total']);
        expect(report.weeks[0]).toEqual({
            label: 'Jan 28 – Feb 03, 2025',
            hours: ['0.0', '0.0', '10.0', '5.0'],
            total: '15.0',
        });
        expect(report.totals).toEqual({ label: 'TOTALS', hours: ['0.0', '0.0', '18.0', '5.0'], total: '23.0' });
    });
});

describe('renderReportPdf', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hours-report-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes a PDF file', async () => {
        const output = path.join(dir, 'report.pdf');
        await renderReportPdf(buildReport(scenarioLedger(), target, '2025-02-12'), output);
        expect(fs.readFileSync(output).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('handles an empty ledger and a ledger spanning several pages', async () => {
        const empty = path.join(dir, 'empty.pdf');
        await renderReportPdf(buildReport(emptyLedger(), target, '2025-02-12'), empty);
        expect(fs.statSync(empty).size).toBeGreaterThan(0);

        const data = emptyLedger();
        for (let i = 0; i < 80; i++) {
            addHours(getOrCreateWeek(data, addDaysIso('2025-01-28', i * 7)), 'direct', 12);
        }
        const long = path.join(dir, 'long.pdf');
        await renderReportPdf(buildReport(data, target, '2026-08-11'), long);
        expect(fs.statSync(long).size).toBeGreaterThan(fs.statSync(empty).size);
    });
});
