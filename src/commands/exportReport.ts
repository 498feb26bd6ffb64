import { spawn } from 'child_process';
import * as path from 'path';
import type { CommandContext } from '../types/context';
import { dataFile, loadConfig } from '../utils/configHelper';
import { ensureDir, loadLedger } from '../utils/fsHelper';
import { warn } from '../utils/logger';
import { buildReport, renderReportPdf } from '../utils/reportHelper';

export interface ExportReportOptions {
    /** Overrides <dataDir>/exports/hours-report-<today>.pdf. */
    output?: string;
    open?: boolean;
}

export function defaultReportPath(dataDir: string, today: string): string {
    return path.join(dataDir, 'exports', `hours-report-${today}.pdf`);
}

/**
 * Hands the file to the platform's default viewer without waiting for it.
 */
function openFile(filePath: string): void {
    const [command, args]: [string, string[]] =
        process.platform === 'darwin'
            ? ['open', [filePath]]
            : process.platform === 'win32'
              ? ['cmd', ['/c', 'start', '', filePath]]
              : ['xdg-open', [filePath]];
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', err => warn(`Could not open ${filePath}: ${err.message}`));
    child.unref();
}

/**
 * Handler for `hours export`.
 */
export async function exportReport(context: CommandContext, options: ExportReportOptions): Promise<void> {
    const config = loadConfig(context.env);
    const data = loadLedger(dataFile(config));

    const outputPath = options.output ?? defaultReportPath(config.data.directory, context.today);
    ensureDir(path.dirname(outputPath));

    await renderReportPdf(buildReport(data, config.licensure, context.today), outputPath);
    console.log(`Report saved to ${outputPath}`);

    if (options.open) {
        openFile(outputPath);
    }
}
