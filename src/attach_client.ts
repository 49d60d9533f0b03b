/**
 * Attach Client: launches the agent attach handshake against a target JVM.
 *
 * The handshake itself belongs to the agent distribution (sandbox-core.jar);
 * this module only builds the launcher command line and maps its outcome.
 */

import * as path from 'path';
import { createLogger } from './logger';
import { type CommandRunner, runCommand } from './process_exec';

const log = createLogger('attach-client');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface AttachRequest {
    port: string;
    /** JDK home; empty means `java` from PATH */
    javaHome: string;
    processId: string;
}

export interface AttachResult {
    success: boolean;
    message: string;
    /** Owner of the target process, reported on failure so the port can be recovered */
    recoveredIdentity: string;
}

export interface AttachClient {
    attach(request: AttachRequest): Promise<AttachResult>;
}

export interface JavaAgentAttachOptions {
    agentHome: string;
    namespace: string;
    timeoutMs: number;
    run?: CommandRunner;
}

/* -------------------------------------------------------------------------- */
/* jvm-sandbox launcher                                                       */
/* -------------------------------------------------------------------------- */

export function javaExecutable(javaHome: string): string {
    return javaHome ? path.join(javaHome, 'bin', 'java') : 'java';
}

export function buildAttachArgs(request: AttachRequest, agentHome: string, namespace: string): string[] {
    const args: string[] = [];
    if (request.javaHome) {
        // JDK 8 keeps the attach API in tools.jar
        args.push(`-Xbootclasspath/a:${path.join(request.javaHome, 'lib', 'tools.jar')}`);
    }
    const agentArgs = [
        `home=${agentHome}`,
        'server.ip=127.0.0.1',
        `server.port=${request.port}`,
        `namespace=${namespace}`,
    ].join(';');

    args.push(
        '-jar', path.join(agentHome, 'lib', 'sandbox-core.jar'),
        request.processId,
        path.join(agentHome, 'lib', 'sandbox-agent.jar'),
        agentArgs
    );
    return args;
}

export class JavaAgentAttachClient implements AttachClient {
    private readonly run: CommandRunner;

    constructor(private readonly options: JavaAgentAttachOptions) {
        this.run = options.run ?? runCommand;
    }

    async attach(request: AttachRequest): Promise<AttachResult> {
        const java = javaExecutable(request.javaHome);
        const args = buildAttachArgs(request, this.options.agentHome, this.options.namespace);
        log.info('attaching agent', { pid: request.processId, port: request.port });

        const result = await this.run(java, args, this.options.timeoutMs);
        if (result.ok) {
            return { success: true, message: result.stdout.trim(), recoveredIdentity: '' };
        }

        const message = [result.stderr.trim(), result.stdout.trim(), result.error ?? '']
            .filter((s) => s.length > 0)
            .join('; ') || `attach exited with code ${String(result.code)}`;
        log.warn('attach failed', { pid: request.processId, port: request.port, message });

        return { success: false, message, recoveredIdentity: await this.processOwner(request.processId) };
    }

    private async processOwner(processId: string): Promise<string> {
        const owner = await this.run('ps', ['-o', 'user=', '-p', processId], 5000);
        if (!owner.ok) {
            log.debug('process owner lookup failed', { pid: processId, error: owner.error });
            return '';
        }
        return owner.stdout.trim();
    }
}
