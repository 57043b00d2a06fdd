import { execFile } from 'node:child_process';
import util from 'node:util';

const execFileAsync = util.promisify(execFile);

export interface RunOptions {
    cwd?: string;
    signal?: AbortSignal;
    maxBuffer?: number;
}

/**
 * Runs a binary with an argument vector (no shell), so URLs and paths are passed verbatim.
 */
export async function runFile(file: string, args: string[], options: RunOptions = {}): Promise<{ stdout: string; stderr: string }> {
    const result = await execFileAsync(file, args, {
        cwd: options.cwd,
        signal: options.signal,
        maxBuffer: options.maxBuffer ?? 16 * 1024 * 1024,
        encoding: 'utf8',
    });
    return {
        stdout: result.stdout.toString(),
        stderr: result.stderr.toString(),
    };
}
