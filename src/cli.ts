#!/usr/bin/env node
/**
 * CLI Entry Point for faultline
 *
 *   faultline prepare jvm --process tomcat [--port 34000] [--async --endpoint URL]
 *   faultline status --uid <uid>
 */

import * as fs from 'fs';
import { AsyncDispatcher, type DetachedLauncher, NodeDetachedLauncher } from './async_dispatcher';
import { type AttachClient, JavaAgentAttachClient } from './attach_client';
import { AttachRetryEngine } from './attach_retry';
import { type FaultlineConfig, loadConfig } from './config';
import { clearCorrelation, createLogger } from './logger';
import { LocalPortAllocator, type PortAllocator } from './port_allocator';
import { PrepareCommand } from './prepare_command';
import { type PrepareRequest, PreparationCoordinator } from './preparation_coordinator';
import { type PreparationStore, SqlitePreparationStore, recordToJson } from './preparation_store';
import { type ProcessResolver, PsProcessResolver } from './process_resolver';
import { type CommandResponse, failureResponse, printResponse, successResponse } from './response';
import { ResultReporter } from './result_reporter';
import { ErrorFactory, PreparationError, toPreparationError } from './structured_error';
import { type PortLookup, SandboxTokenPortLookup } from './token_port_lookup';

const log = createLogger('cli');

/* -------------------------------------------------------------------------- */
/* Flag parsing                                                               */
/* -------------------------------------------------------------------------- */

type StringFlag = 'javaHome' | 'processName' | 'processId' | 'uid' | 'endpoint' | 'port';
type BoolFlag = 'async' | 'nohup';

const STRING_FLAGS = new Map<string, StringFlag>([
    ['--javaHome', 'javaHome'], ['-j', 'javaHome'],
    ['--process', 'processName'], ['-p', 'processName'],
    ['--pid', 'processId'],
    ['--port', 'port'], ['-P', 'port'],
    ['--uid', 'uid'], ['-u', 'uid'],
    ['--endpoint', 'endpoint'], ['-e', 'endpoint'],
]);

const BOOL_FLAGS = new Map<string, BoolFlag>([
    ['--async', 'async'], ['-a', 'async'],
    ['--nohup', 'nohup'], ['-n', 'nohup'],
]);

export function parsePrepareFlags(args: string[]): PrepareRequest {
    const req: PrepareRequest = {
        processName: '',
        processId: '',
        port: 0,
        javaHome: '',
        async: false,
        nohup: false,
        uid: '',
        endpoint: '',
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const name = eq === -1 ? arg : arg.slice(0, eq);

        const boolFlag = BOOL_FLAGS.get(name);
        if (boolFlag && eq === -1) {
            req[boolFlag] = true;
            continue;
        }

        const stringFlag = STRING_FLAGS.get(name);
        if (!stringFlag) {
            throw new PreparationError('INVALID_INPUT', `unknown flag: ${arg}`, { reason: 'unknown_flag' });
        }

        let value: string;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            const next = args[i + 1];
            if (next === undefined) {
                throw new PreparationError('INVALID_INPUT', `${name} requires a value`, { reason: 'missing_value' });
            }
            value = next;
            i++;
        }

        if (stringFlag === 'port') {
            const port = Number(value);
            if (!/^\d+$/.test(value) || port > 65535) {
                throw ErrorFactory.invalidFlag(name, value);
            }
            req.port = port;
        } else {
            req[stringFlag] = value;
        }
    }
    return req;
}

export function flagValue(args: string[], ...names: string[]): string | undefined {
    for (let i = 0; i < args.length; i++) {
        for (const n of names) {
            if (args[i] === n) return args[i + 1];
            if (args[i].startsWith(`${n}=`)) return args[i].slice(n.length + 1);
        }
    }
    return undefined;
}

/* -------------------------------------------------------------------------- */
/* Wiring                                                                     */
/* -------------------------------------------------------------------------- */

export interface Collaborators {
    resolver: ProcessResolver;
    ports: PortAllocator;
    attachClient: AttachClient;
    portLookup: PortLookup;
    launcher: DetachedLauncher;
    sleep: (ms: number) => Promise<void>;
}

export function buildPrepareCommand(
    config: FaultlineConfig,
    store: PreparationStore,
    overrides: Partial<Collaborators> = {}
): PrepareCommand {
    const attachClient = overrides.attachClient ?? new JavaAgentAttachClient({
        agentHome: config.agentHome,
        namespace: config.agentNamespace,
        timeoutMs: config.attachTimeoutMs,
    });
    const portLookup = overrides.portLookup ?? new SandboxTokenPortLookup(config.agentNamespace);
    const dispatcher = new AsyncDispatcher(overrides.launcher ?? new NodeDetachedLauncher(), config.logDir);

    const coordinator = new PreparationCoordinator({
        store,
        resolver: overrides.resolver ?? new PsProcessResolver(),
        ports: overrides.ports ?? new LocalPortAllocator(),
        dispatcher,
        asyncGraceMs: config.asyncGraceMs,
        sleep: overrides.sleep,
    });

    return new PrepareCommand({
        store,
        coordinator,
        retry: new AttachRetryEngine(attachClient, portLookup, store),
        reporter: new ResultReporter(store, config.reportTimeoutMs),
    });
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

export type StoreFactory = (config: FaultlineConfig) => PreparationStore;

const openSqliteStore: StoreFactory = (config) => {
    fs.mkdirSync(config.home, { recursive: true });
    return new SqlitePreparationStore(config.dbPath);
};

class FaultlineCLI {
    constructor(
        private readonly config: FaultlineConfig = loadConfig(),
        private readonly openStore: StoreFactory = openSqliteStore,
        private readonly overrides: Partial<Collaborators> = {},
        private readonly write: (line: string) => void = (line) => process.stdout.write(line + '\n')
    ) {}

    /**
     * Runs one command; resolves to the process exit code.
     */
    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';

        switch (command) {
            case 'prepare':
                if (args[3] !== 'jvm') {
                    return this.emit(failureResponse(
                        new PreparationError('INVALID_INPUT', `unknown prepare target: ${args[3] ?? ''}`, { reason: 'unknown_target' })
                    ));
                }
                return this.emit(await this.runPrepare(args.slice(4)));
            case 'status':
                return this.emit(await this.runStatus(args.slice(3)));
            case 'help':
            default:
                this.showHelp();
                return command === 'help' ? 0 : 1;
        }
    }

    private async runPrepare(args: string[]): Promise<CommandResponse> {
        let req: PrepareRequest;
        try {
            req = parsePrepareFlags(args);
        } catch (err) {
            return failureResponse(toPreparationError(err));
        }

        return this.withStore(async (store) => {
            const command = buildPrepareCommand(this.config, store, this.overrides);
            return command.run(req);
        });
    }

    private async runStatus(args: string[]): Promise<CommandResponse> {
        const uid = flagValue(args, '--uid', '-u');
        if (!uid) {
            return failureResponse(new PreparationError('INVALID_INPUT', 'less --uid flag', { reason: 'missing_uid' }));
        }
        return this.withStore(async (store) => {
            const record = store.findByUid(uid);
            if (!record) {
                return failureResponse(
                    new PreparationError('INVALID_INPUT', `the ${uid} record not found`, { reason: 'unknown_uid', uid })
                );
            }
            return successResponse(recordToJson(record));
        });
    }

    private async withStore(fn: (store: PreparationStore) => Promise<CommandResponse>): Promise<CommandResponse> {
        let store: PreparationStore;
        try {
            store = this.openStore(this.config);
        } catch (err) {
            return failureResponse(toPreparationError(err));
        }
        try {
            return await fn(store);
        } catch (err) {
            return failureResponse(toPreparationError(err));
        } finally {
            store.close();
            clearCorrelation();
        }
    }

    private emit(response: CommandResponse): number {
        this.write(printResponse(response));
        return response.success ? 0 : 1;
    }

    private showHelp(): void {
        this.write([
            'Usage: faultline <command> [flags]',
            '',
            'Commands:',
            '  prepare jvm   Attach the agent to a java process',
            '  status        Show the preparation record of a uid',
            '  help          Show this help',
            '',
            'prepare jvm flags:',
            '  -j, --javaHome <path>    the java jdk home path',
            '  -p, --process <name>     the java application process name',
            '      --pid <pid>          the target java process id',
            '  -P, --port <port>        the port used for agent server',
            '  -a, --async              attach asynchronously, default is false',
            '  -e, --endpoint <url>     the attach result reporting address (with --async)',
            '  -u, --uid <uid>          used by the internal async attach',
            '  -n, --nohup              used by the internal async attach',
            '',
            'Example:',
            '  faultline prepare jvm --process tomcat',
        ].join('\n'));
    }
}

// Run CLI
if (require.main === module) {
    const cli = new FaultlineCLI();
    cli.run(process.argv).then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            log.error('fatal error', { error: String(err) });
            process.exitCode = 1;
        }
    );
}

export { FaultlineCLI };
