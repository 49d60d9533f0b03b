/**
 * Process resolution: turns the caller's --process / --pid flags into the pid
 * of a live JVM.
 */

import { createLogger } from './logger';
import { type CommandRunner, isProcessAlive, runCommand } from './process_exec';
import { ErrorFactory, PreparationError } from './structured_error';

const log = createLogger('process-resolver');

const PS_TIMEOUT_MS = 10000;

export interface ProcessResolver {
    /** Resolves to the live pid; rejects with TARGET_NOT_FOUND / INVALID_INPUT. */
    resolve(processName: string, processId: string): Promise<string>;
}

export interface ProcessEntry {
    pid: string;
    args: string;
}

/**
 * Parses `ps -eo pid=,args=` output into entries.
 */
export function parseProcessList(output: string): ProcessEntry[] {
    const entries: ProcessEntry[] = [];
    for (const raw of output.split('\n')) {
        const line = raw.trim();
        const match = /^(\d+)\s+(.+)$/.exec(line);
        if (match) entries.push({ pid: match[1], args: match[2] });
    }
    return entries;
}

/**
 * Java processes whose command line mentions the name, excluding this CLI itself.
 */
export function matchJavaProcesses(entries: ProcessEntry[], processName: string, selfPid: string): ProcessEntry[] {
    return entries.filter((e) => {
        if (e.pid === selfPid) return false;
        const executable = e.args.split(/\s+/)[0];
        const isJava = /(^|\/)java$/.test(executable);
        return isJava && e.args.includes(processName);
    });
}

export class PsProcessResolver implements ProcessResolver {
    constructor(
        private readonly run: CommandRunner = runCommand,
        private readonly alive: (pid: number) => boolean = isProcessAlive
    ) {}

    async resolve(processName: string, processId: string): Promise<string> {
        if (processId) {
            const pid = Number(processId);
            if (!Number.isInteger(pid) || pid <= 0) {
                throw ErrorFactory.invalidFlag('--pid', processId);
            }
            if (!this.alive(pid)) {
                throw ErrorFactory.targetNotFound(`the ${processId} process id not found`, { pid: processId });
            }
            return String(pid);
        }

        const listing = await this.run('ps', ['-eo', 'pid=,args='], PS_TIMEOUT_MS);
        if (!listing.ok) {
            throw ErrorFactory.targetNotFound(
                `list processes failed, ${listing.error || listing.stderr.trim()}`,
                { process: processName }
            );
        }

        const matches = matchJavaProcesses(parseProcessList(listing.stdout), processName, String(process.pid));
        log.debug('java process candidates', { process: processName, pids: matches.map((m) => m.pid) });

        if (matches.length === 0) {
            throw ErrorFactory.targetNotFound(`${processName} process not found`, { process: processName });
        }
        if (matches.length > 1) {
            throw new PreparationError(
                'INVALID_INPUT',
                `too many java processes match ${processName}: ${matches.map((m) => m.pid).join(',')}, please specify --pid`,
                { reason: 'ambiguous_process', process: processName }
            );
        }
        return matches[0].pid;
    }
}
