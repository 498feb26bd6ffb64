import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { GitConfig } from '../types/config';
import { describeError, HoursError } from './errors';
import { DATA_FILE_NAME, ensureDir } from './fsHelper';
import { debug, warn } from './logger';

interface GitOutput {
    ok: boolean;
    stdout: string;
    stderr: string;
}

const GITIGNORE = '*.tmp\nexports/\n';

function runGit(dataDir: string, args: string[]): GitOutput {
    debug(`git -C ${dataDir} ${args.join(' ')}`);
    const result = spawnSync('git', ['-C', dataDir, ...args], { encoding: 'utf-8' });
    if (result.error) {
        throw new HoursError('IoError', `Failed to run git ${args.join(' ')}: ${describeError(result.error)}`, {
            cause: result.error,
        });
    }
    return { ok: result.status === 0, stdout: result.stdout, stderr: result.stderr };
}

function runGitChecked(dataDir: string, args: string[]): void {
    const output = runGit(dataDir, args);
    if (!output.ok) {
        throw new HoursError('IoError', `git ${args.join(' ')} failed: ${output.stderr.trim()}`);
    }
}

export function gitBinaryExists(): boolean {
    const result = spawnSync('git', ['--version'], { stdio: 'ignore' });
    return !result.error && result.status === 0;
}

export function isGitRepo(dataDir: string): boolean {
    return runGit(dataDir, ['rev-parse', '--git-dir']).ok;
}

function currentBranch(dataDir: string): string {
    const output = runGit(dataDir, ['rev-parse', '--abbrev-ref', 'HEAD']);
    return output.ok ? output.stdout.trim() : 'main';
}

/**
 * Turns the data directory into a repository with the given remote.
 */
export function gitInit(dataDir: string, remoteName: string, remoteUrl: string | undefined): void {
    if (!gitBinaryExists()) {
        throw new HoursError('IoError', 'git is not installed. Install git and try again.');
    }
    ensureDir(dataDir);
    if (!isGitRepo(dataDir)) {
        runGitChecked(dataDir, ['init']);
    }
    if (remoteUrl && !runGit(dataDir, ['remote', 'get-url', remoteName]).ok) {
        runGitChecked(dataDir, ['remote', 'add', remoteName, remoteUrl]);
    }
    fs.writeFileSync(path.join(dataDir, '.gitignore'), GITIGNORE, 'utf-8');
}

/**
 * Stages the ledger and commits. An unchanged tree is not an error.
 */
export function gitCommit(dataDir: string, message: string): void {
    if (!isGitRepo(dataDir)) {
        throw new HoursError('IoError', "Data directory is not a git repository. Run 'hours init' to set up.");
    }
    runGitChecked(dataDir, ['add', DATA_FILE_NAME]);
    if (fs.existsSync(path.join(dataDir, '.gitignore'))) {
        runGit(dataDir, ['add', '.gitignore']);
    }
    const output = runGit(dataDir, ['commit', '-m', message]);
    if (!output.ok) {
        if (output.stdout.includes('nothing to commit') || output.stderr.includes('nothing to commit')) {
            return;
        }
        throw new HoursError('IoError', `git commit failed: ${output.stderr.trim()}`);
    }
}

export function gitPush(dataDir: string, remote: string): void {
    const output = runGit(dataDir, ['push', '-u', remote, currentBranch(dataDir)]);
    if (!output.ok) {
        warn(`git push failed: ${output.stderr.trim()}. Data saved locally.`);
    }
}

/**
 * Commits (and optionally pushes) the data directory after a successful save.
 */
export function gitSync(dataDir: string, config: GitConfig, message: string, disabled: boolean): void {
    if (disabled) {
        return;
    }
    if (!gitBinaryExists()) {
        warn('git is not installed. Data is saved locally only.');
        return;
    }
    gitCommit(dataDir, message);
    if (config.autoPush) {
        const remotes = runGit(dataDir, ['remote']);
        if (!remotes.stdout.trim()) {
            warn('No git remote configured. Data is saved locally only.');
        } else {
            gitPush(dataDir, config.remote);
        }
    }
}

export function gitInitAndCommit(dataDir: string, config: GitConfig, remoteUrl: string | undefined, disabled: boolean): void {
    if (disabled) {
        return;
    }
    gitInit(dataDir, config.remote, remoteUrl);
    gitCommit(dataDir, 'Initialize hours tracking');
    if (config.autoPush) {
        gitPush(dataDir, config.remote);
    }
}

/**
 * Runs gitSync after a save. The ledger is already on disk, so a failed
 * commit or push is reported as a warning instead of failing the command.
 */
export function syncOrWarn(dataDir: string, config: GitConfig, message: string, disabled: boolean): void {
    try {
        gitSync(dataDir, config, message, disabled);
    } catch (err) {
        warn(`${describeError(err)}. Data saved locally.`);
    }
}
