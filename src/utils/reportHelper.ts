import * as fs from 'fs';
import PDFDocument from 'pdfkit';
import type { LicensureTarget } from '../types/config';
import { CATEGORIES } from '../types/hoursData';
import type { HoursData, IsoDate } from '../types/hoursData';
import { describeError, HoursError } from './errors';
import { CATEGORY_LABELS, categoryTotals, weekTotal } from './ledgerHelper';
import { calculateProgress, roundTenth } from './progressHelper';
import type { ProgressMetric } from './progressHelper';
import { formatLongDate, formatWeekLabel } from './weekHelper';

export interface ReportProgressRow {
    label: string;
    current: string;
    target: string;
    percentage: string;
}

export interface ReportWeekRow {
    label: string;
    /** One cell per category, in CATEGORIES order. */
    hours: string[];
    total: string;
}

/**
 * Everything the PDF shows, already formatted. Figures come from
 * calculateProgress so the report always agrees with `hours summary`.
 */
export interface ReportDocument {
    title: string;
    generatedOn: string;
    period: string;
    progress: ReportProgressRow[];
    weeksLogged: number;
    columns: string[];
    weeks: ReportWeekRow[];
    totals: ReportWeekRow;
}

const fixed1 = (value: number): string => roundTenth(value).toFixed(1);

function progressRow(label: string, metric: ProgressMetric, whole = false): ReportProgressRow {
    return {
        label,
        current: whole ? String(metric.current) : fixed1(metric.current),
        target: String(metric.target),
        percentage: `${fixed1(metric.percentage)}%`,
    };
}

export function buildReport(data: HoursData, target: LicensureTarget, today: IsoDate): ReportDocument {
    const progress = calculateProgress(data, target, today);
    const sums = categoryTotals(data.weeks);

    return {
        title: 'Counseling Licensure Hours Report',
        generatedOn: formatLongDate(today),
        period: `${formatLongDate(target.startDate)} – ${formatLongDate(today)}`,
        progress: [
            progressRow('Total supervised hours', progress.totalHours),
            progressRow('Direct client hours', progress.directHours),
            progressRow('Months of experience', progress.months, true),
            progressRow('Weekly average', progress.weeklyAverage),
        ],
        weeksLogged: progress.weeksLogged,
        columns: ['Week', ...CATEGORIES.map(c => CATEGORY_LABELS[c].short), 'Total'],
        weeks: data.weeks.map(week => ({
            label: formatWeekLabel(week),
            hours: CATEGORIES.map(c => fixed1(week[c])),
            total: fixed1(weekTotal(week)),
        })),
        totals: {
            label: 'TOTALS',
            hours: CATEGORIES.map(c => fixed1(sums[c])),
            total: fixed1(progress.totalHours.current),
        },
    };
}

const MARGIN = 50;
const WEEK_COLUMN_WIDTH = 170;
const VALUE_COLUMN_WIDTH = 62;
const ROW_HEIGHT = 16;

function drawRow(doc: PDFKit.PDFDocument, row: ReportWeekRow, bold: boolean): void {
    if (doc.y > doc.page.height - doc.page.margins.bottom - ROW_HEIGHT) {
        doc.addPage();
    }
    const y = doc.y;
    doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(9);
    doc.text(row.label, MARGIN, y, { width: WEEK_COLUMN_WIDTH });
    [...row.hours, row.total].forEach((cell, i) => {
        doc.text(cell, MARGIN + WEEK_COLUMN_WIDTH + i * VALUE_COLUMN_WIDTH, y, {
            width: VALUE_COLUMN_WIDTH,
            align: 'right',
        });
    });
    doc.y = y + ROW_HEIGHT;
}

/**
 * Lays the report out on letter-size pages and writes it to `outputPath`.
 */
export function renderReportPdf(report: ReportDocument, outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ size: 'LETTER', margin: MARGIN });
        const stream = fs.createWriteStream(outputPath);
        stream.on('finish', () => resolve());
        stream.on('error', err =>
            reject(new HoursError('IoError', `Failed to write "${outputPath}": ${describeError(err)}`, { cause: err }))
        );
        doc.pipe(stream);

        doc.font('Helvetica-Bold').fontSize(18).text(report.title);
        doc.moveDown(0.3);
        doc.font('Helvetica').fontSize(10).text(`Generated ${report.generatedOn}`);
        doc.text(`Period: ${report.period}`);
        doc.moveDown();

        doc.font('Helvetica-Bold').fontSize(13).text('Progress');
        doc.moveDown(0.3);
        doc.font('Helvetica').fontSize(10);
        for (const row of report.progress) {
            doc.text(`${row.label}: ${row.current} / ${row.target} (${row.percentage})`);
        }
        doc.text(`Weeks logged: ${report.weeksLogged}`);
        doc.moveDown();

        doc.font('Helvetica-Bold').fontSize(13).text('Weekly Hours');
        doc.moveDown(0.3);
        if (report.weeks.length === 0) {
            doc.font('Helvetica').fontSize(10).text('No hours logged yet.');
        } else {
            const [weekHeader, ...valueHeaders] = report.columns;
            drawRow(doc, { label: weekHeader, hours: valueHeaders.slice(0, -1), total: valueHeaders[valueHeaders.length - 1] }, true);
            const lineY = doc.y - 3;
            doc.moveTo(MARGIN, lineY)
                .lineTo(MARGIN + WEEK_COLUMN_WIDTH + valueHeaders.length * VALUE_COLUMN_WIDTH, lineY)
                .stroke();
            for (const week of report.weeks) {
                drawRow(doc, week, false);
            }
            drawRow(doc, report.totals, true);
        }

        doc.end();
    });
}
