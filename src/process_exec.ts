/**
 * Thin promise wrapper over execFile used by the collaborators that shell out
 * (process listing, agent launcher). Never rejects: a non-zero exit, a spawn
 * error and a timeout all come back as a failed ExecResult.
 */

import { execFile } from 'child_process';

export interface ExecResult {
    ok: boolean;
    code: number | null;
    stdout: string;
    stderr: string;
    /** spawn error or timeout, when there was one */
    error?: string;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<ExecResult>;

export const runCommand: CommandRunner = (file, args, timeoutMs) => {
    return new Promise<ExecResult>((resolve) => {
        execFile(file, args, { timeout: timeoutMs, encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 }, (err, stdout, stderr) => {
            if (!err) {
                resolve({ ok: true, code: 0, stdout, stderr });
                return;
            }
            const code = typeof err.code === 'number' ? err.code : null;
            resolve({
                ok: false,
                code,
                stdout,
                stderr,
                error: err.killed ? `${file} timed out after ${timeoutMs}ms` : err.message,
            });
        });
    });
};

export function isProcessAlive(pid: number): boolean {
    if (!pid || pid <= 0) return false;
    try {
        process.kill(pid, 0);
        return true;
    } catch (err) {
        // EPERM: the process exists but belongs to another user
        return err instanceof Error && 'code' in err && err.code === 'EPERM';
    }
}
