/**
 * Preparation Coordinator
 *
 * Decides, for one `prepare jvm` request, which preparation record the attach
 * runs against:
 *
 *   1. validate the target identity and resolve the live pid
 *   2. look up the latest record for the target
 *   3. no Running record  -> pick a port, insert a Created record (atomic insert-if-absent)
 *      Running record     -> reuse it; a different explicit port is rejected
 *   4. async              -> hand off to the detached re-invocation and short-circuit
 *
 * A --nohup run is that re-invocation: the record already exists, so the uid
 * and port it was given are used as they are and nothing is created or spawned.
 */

import type { AsyncDispatcher } from './async_dispatcher';
import { PREPARE_JVM_TYPE } from './config';
import { createLogger, setCorrelation } from './logger';
import type { PortAllocator } from './port_allocator';
import type { PreparationRecord, PreparationStore } from './preparation_store';
import type { ProcessResolver } from './process_resolver';
import { ErrorFactory, PreparationError, errorMessage } from './structured_error';

const log = createLogger('coordinator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface PrepareRequest {
    processName: string;
    processId: string;
    /** 0 means "allocate one" */
    port: number;
    javaHome: string;
    async: boolean;
    /** set only on the detached re-invocation */
    nohup: boolean;
    uid: string;
    endpoint: string;
}

export type Resolution =
    | {
        kind: 'attach';
        uid: string;
        port: string;
        processId: string;
        record: PreparationRecord | null;
    }
    | {
        kind: 'deferred';
        uid: string;
        port: string;
        /** argv handed to the detached child */
        argv: string[];
    };

export interface CoordinatorDeps {
    store: PreparationStore;
    resolver: ProcessResolver;
    ports: PortAllocator;
    dispatcher: AsyncDispatcher;
    asyncGraceMs: number;
    programType?: string;
    sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/* -------------------------------------------------------------------------- */
/* Coordinator                                                                */
/* -------------------------------------------------------------------------- */

export class PreparationCoordinator {
    private readonly store: PreparationStore;
    private readonly resolver: ProcessResolver;
    private readonly ports: PortAllocator;
    private readonly dispatcher: AsyncDispatcher;
    private readonly asyncGraceMs: number;
    private readonly programType: string;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(deps: CoordinatorDeps) {
        this.store = deps.store;
        this.resolver = deps.resolver;
        this.ports = deps.ports;
        this.dispatcher = deps.dispatcher;
        this.asyncGraceMs = deps.asyncGraceMs;
        this.programType = deps.programType ?? PREPARE_JVM_TYPE;
        this.sleep = deps.sleep ?? defaultSleep;
    }

    async resolve(req: PrepareRequest): Promise<Resolution> {
        if (!req.processName && !req.processId) {
            throw ErrorFactory.missingTarget();
        }

        const processId = await this.resolvePid(req.processName, req.processId);
        setCorrelation({ target: req.processName || processId });
        // an explicit --pid pins the record to that process; a resolved one may be a restart
        const matchPid = req.processId !== '';

        const existing = this.persist('query attach java process record', () =>
            this.store.findRecord(this.programType, req.processName, processId, matchPid)
        );

        if (req.nohup) {
            return this.resumeDetached(req, processId, existing);
        }

        let record: PreparationRecord;
        if (!existing || existing.status !== 'Running') {
            const port = req.port !== 0 ? String(req.port) : await this.allocatePort();
            const outcome = this.persist('insert prepare record', () =>
                this.store.insertIfAbsent(
                    { programType: this.programType, process: req.processName, port, pid: processId },
                    matchPid
                )
            );
            record = outcome.record;
            if (outcome.created) {
                log.info('created preparation record', { uid: record.uid, port: record.port, pid: processId });
            } else {
                // lost the race against a concurrent invocation that is already Running
                this.assertSamePort(req.port, record);
            }
        } else {
            this.assertSamePort(req.port, existing);
            record = existing;
            log.info('reusing running preparation record', { uid: record.uid, port: record.port });
        }
        setCorrelation({ uid: record.uid });

        if (req.async) {
            const argv = this.dispatcher.dispatch({
                uid: record.uid,
                port: record.port,
                processName: req.processName,
                processId,
                javaHome: req.javaHome,
                async: req.async,
                endpoint: req.endpoint,
            });
            await this.sleep(this.asyncGraceMs);
            return { kind: 'deferred', uid: record.uid, port: record.port, argv };
        }

        return { kind: 'attach', uid: record.uid, port: record.port, processId, record };
    }

    /* ------------------------------------------------------------------------ */
    /* Internals                                                                */
    /* ------------------------------------------------------------------------ */

    private resumeDetached(req: PrepareRequest, processId: string, existing: PreparationRecord | null): Resolution {
        const record = req.uid
            ? this.persist('query preparation by uid', () => this.store.findByUid(req.uid))
            : existing;

        const uid = req.uid || record?.uid || '';
        const port = req.port !== 0 ? String(req.port) : record?.port ?? '';
        if (!uid || !port) {
            throw new PreparationError(
                'INVALID_INPUT',
                '--nohup needs a known preparation record, pass --uid and --port',
                { reason: 'nohup_without_record' }
            );
        }
        setCorrelation({ uid });
        return { kind: 'attach', uid, port, processId, record };
    }

    private async resolvePid(processName: string, processId: string): Promise<string> {
        try {
            return await this.resolver.resolve(processName, processId);
        } catch (err) {
            if (err instanceof PreparationError) throw err;
            throw ErrorFactory.targetNotFound(errorMessage(err), { process: processName, pid: processId });
        }
    }

    private async allocatePort(): Promise<string> {
        try {
            return String(await this.ports.allocate());
        } catch (err) {
            throw ErrorFactory.portAllocation(err);
        }
    }

    private assertSamePort(requested: number, record: PreparationRecord): void {
        if (requested !== 0 && String(requested) !== record.port) {
            throw ErrorFactory.conflictingPort(requested, record.port);
        }
    }

    private persist<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            if (err instanceof PreparationError) throw err;
            throw ErrorFactory.persistence(operation, err);
        }
    }
}
