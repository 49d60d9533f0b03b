// In-process stand-ins for the collaborators the prepare flow talks to.

import type http from 'node:http';

import type { DetachedLauncher } from '../src/async_dispatcher';
import type { AttachClient, AttachRequest, AttachResult } from '../src/attach_client';
import type { FaultlineConfig } from '../src/config';
import type { PortAllocator } from '../src/port_allocator';
import type {
    InsertOutcome,
    NewPreparation,
    PreparationRecord,
    PreparationStatus,
    PreparationStore,
} from '../src/preparation_store';
import type { ProcessResolver } from '../src/process_resolver';
import type { PortLookup } from '../src/token_port_lookup';

export function testConfig(overrides: Partial<FaultlineConfig> = {}): FaultlineConfig {
    return {
        home: '/tmp/faultline-test',
        dbPath: ':memory:',
        logDir: '/tmp/faultline-test/logs',
        agentHome: '/opt/sandbox',
        agentNamespace: 'default',
        asyncGraceMs: 0,
        attachTimeoutMs: 1000,
        reportTimeoutMs: 2000,
        ...overrides,
    };
}

export class FakeResolver implements ProcessResolver {
    calls: Array<{ processName: string; processId: string }> = [];

    constructor(public livePid: string = '4242') {}

    async resolve(processName: string, processId: string): Promise<string> {
        this.calls.push({ processName, processId });
        return processId || this.livePid;
    }
}

export class FakePorts implements PortAllocator {
    calls = 0;

    constructor(private readonly next: number[] = [34000]) {}

    async allocate(): Promise<number> {
        const port = this.next[Math.min(this.calls, this.next.length - 1)];
        this.calls++;
        return port;
    }
}

/** Answers attach calls from a script keyed by port; unknown ports succeed. */
export class ScriptedAttachClient implements AttachClient {
    calls: AttachRequest[] = [];

    constructor(private readonly byPort: Record<string, AttachResult> = {}) {}

    async attach(request: AttachRequest): Promise<AttachResult> {
        this.calls.push(request);
        return this.byPort[request.port] ?? { success: true, message: 'attached', recoveredIdentity: '' };
    }
}

export class FakePortLookup implements PortLookup {
    calls: string[] = [];

    constructor(private readonly ports: Record<string, string> = {}) {}

    async lookup(identity: string): Promise<string> {
        this.calls.push(identity);
        const port = this.ports[identity];
        if (port === undefined) throw new Error(`no token for ${identity}`);
        return port;
    }
}

export class RecordingLauncher implements DetachedLauncher {
    launches: Array<{ argv: string[]; logFile: string }> = [];

    launch(argv: string[], logFile: string): void {
        this.launches.push({ argv, logFile });
    }
}

type StoreMethod = 'findRecord' | 'insertIfAbsent' | 'findByUid' | 'updatePort' | 'updatePid' | 'updateStatus';

/**
 * Delegates to a real store, except for the methods told to fail.
 */
export class FlakyStore implements PreparationStore {
    failing = new Set<StoreMethod>();

    constructor(private readonly inner: PreparationStore) {}

    private check(method: StoreMethod): void {
        if (this.failing.has(method)) throw new Error(`${method}: database is locked`);
    }

    findRecord(programType: string, processName: string, processId: string, matchPid?: boolean): PreparationRecord | null {
        this.check('findRecord');
        return this.inner.findRecord(programType, processName, processId, matchPid);
    }

    insertRecord(input: NewPreparation): PreparationRecord {
        return this.inner.insertRecord(input);
    }

    insertIfAbsent(input: NewPreparation, matchPid?: boolean): InsertOutcome {
        this.check('insertIfAbsent');
        return this.inner.insertIfAbsent(input, matchPid);
    }

    findByUid(uid: string): PreparationRecord | null {
        this.check('findByUid');
        return this.inner.findByUid(uid);
    }

    updatePort(uid: string, port: string): void {
        this.check('updatePort');
        this.inner.updatePort(uid, port);
    }

    updatePid(uid: string, pid: string): void {
        this.check('updatePid');
        this.inner.updatePid(uid, pid);
    }

    updateStatus(uid: string, status: PreparationStatus, error: string): void {
        this.check('updateStatus');
        this.inner.updateStatus(uid, status, error);
    }

    close(): void {
        this.inner.close();
    }
}

/** Listens on an ephemeral loopback port and resolves to the base URL. */
export async function listenLocal(server: http.Server): Promise<string> {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
}
