/**
 * Async Dispatcher: completes a preparation out of process.
 *
 * The whole `prepare jvm` command is re-invoked as a detached child that
 * outlives the caller. The child carries the record uid and --nohup, so it
 * attaches synchronously against the existing record instead of creating
 * another one or spawning again.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { errorMessage } from './structured_error';

const log = createLogger('async-dispatcher');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface DispatchRequest {
    uid: string;
    port: string;
    processName: string;
    processId: string;
    javaHome: string;
    async: boolean;
    endpoint: string;
}

export interface DetachedLauncher {
    /** Starts the CLI with argv, detached from this process. Must not wait for it. */
    launch(argv: string[], logFile: string): void;
}

/* -------------------------------------------------------------------------- */
/* Re-invocation command line                                                 */
/* -------------------------------------------------------------------------- */

export function buildReinvocationArgs(req: DispatchRequest): string[] {
    const args = ['prepare', 'jvm', '--uid', req.uid, '--nohup'];
    if (req.port) args.push('--port', req.port);
    if (req.processName) args.push('--process', req.processName);
    if (req.javaHome) args.push('--javaHome', req.javaHome);
    if (req.processId) args.push('--pid', req.processId);
    if (req.async) args.push('--async');
    if (req.endpoint) args.push('--endpoint', req.endpoint);
    return args;
}

/* -------------------------------------------------------------------------- */
/* Node launcher                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Re-runs the current entry script with the same node flags (so a tsx loader
 * carries over), output appended to the per-uid log file.
 */
export class NodeDetachedLauncher implements DetachedLauncher {
    constructor(
        private readonly entry: string = process.argv[1],
        private readonly nodeArgs: string[] = process.execArgv,
        private readonly nodePath: string = process.execPath
    ) {}

    launch(argv: string[], logFile: string): void {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
        const out = fs.openSync(logFile, 'a');
        try {
            const child = spawn(this.nodePath, [...this.nodeArgs, this.entry, ...argv], {
                detached: true,
                stdio: ['ignore', out, out],
            });
            child.on('error', (err) => {
                log.warn('detached prepare failed to start', { error: err.message });
            });
            child.unref();
            log.debug('detached prepare started', { child_pid: child.pid, log_file: logFile });
        } finally {
            fs.closeSync(out);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Dispatcher                                                                 */
/* -------------------------------------------------------------------------- */

export class AsyncDispatcher {
    constructor(
        private readonly launcher: DetachedLauncher,
        private readonly logDir: string
    ) {}

    logFileFor(uid: string): string {
        return path.join(this.logDir, `prepare-${uid}.log`);
    }

    /**
     * Fire and forget. Launch failures are logged; the caller still hands the
     * uid back, and the record shows the preparation never completed.
     */
    dispatch(req: DispatchRequest): string[] {
        const argv = buildReinvocationArgs(req);
        try {
            this.launcher.launch(argv, this.logFileFor(req.uid));
            log.info('dispatched detached prepare', { uid: req.uid, port: req.port });
        } catch (err) {
            log.warn('dispatch detached prepare failed', { uid: req.uid, error: errorMessage(err) });
        }
        return argv;
    }
}
