import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { AsyncDispatcher } from '../src/async_dispatcher';
import { PreparationCoordinator, type PrepareRequest } from '../src/preparation_coordinator';
import { SqlitePreparationStore } from '../src/preparation_store';
import { PreparationError } from '../src/structured_error';
import { FakePorts, FakeResolver, FlakyStore, RecordingLauncher } from './helpers';

function request(overrides: Partial<PrepareRequest> = {}): PrepareRequest {
    return {
        processName: 'tomcat',
        processId: '',
        port: 0,
        javaHome: '',
        async: false,
        nohup: false,
        uid: '',
        endpoint: '',
        ...overrides,
    };
}

function isCode(code: string) {
    return (err: unknown) => err instanceof PreparationError && err.code === code;
}

describe('PreparationCoordinator', () => {
    let inner: SqlitePreparationStore;
    let store: FlakyStore;
    let resolver: FakeResolver;
    let ports: FakePorts;
    let launcher: RecordingLauncher;
    let sleeps: number[];
    let coordinator: PreparationCoordinator;

    beforeEach(() => {
        inner = new SqlitePreparationStore(':memory:');
        store = new FlakyStore(inner);
        resolver = new FakeResolver('4242');
        ports = new FakePorts([34000, 34001]);
        launcher = new RecordingLauncher();
        sleeps = [];
        coordinator = new PreparationCoordinator({
            store,
            resolver,
            ports,
            dispatcher: new AsyncDispatcher(launcher, '/var/log/faultline'),
            asyncGraceMs: 1000,
            sleep: async (ms) => {
                sleeps.push(ms);
            },
        });
    });

    afterEach(() => {
        store.close();
    });

    test('rejects a request with neither process name nor pid', async () => {
        await assert.rejects(coordinator.resolve(request({ processName: '' })), (err: unknown) => {
            assert.ok(err instanceof PreparationError);
            assert.equal(err.code, 'INVALID_INPUT');
            assert.equal(err.message, 'less --process or --pid flags');
            return true;
        });
        assert.equal(resolver.calls.length, 0);
    });

    test('first request allocates a port and creates a record', async () => {
        const resolution = await coordinator.resolve(request());

        assert.equal(resolution.kind, 'attach');
        assert.equal(resolution.port, '34000');
        assert.equal(ports.calls, 1);

        const record = inner.findByUid(resolution.uid);
        assert.equal(record?.status, 'Created');
        assert.equal(record?.process, 'tomcat');
        assert.equal(record?.pid, '4242');
        assert.equal(record?.port, '34000');
    });

    test('an explicit port is used instead of allocating one', async () => {
        const resolution = await coordinator.resolve(request({ port: 35000 }));

        assert.equal(resolution.port, '35000');
        assert.equal(ports.calls, 0);
    });

    test('a Running record is reused with the same uid and no new record', async () => {
        const first = await coordinator.resolve(request());
        inner.updateStatus(first.uid, 'Running', '');

        const second = await coordinator.resolve(request());

        assert.equal(second.kind, 'attach');
        assert.equal(second.uid, first.uid);
        assert.equal(second.port, '34000');
        assert.equal(ports.calls, 1);
        assert.equal(inner.findRecord('jvm', 'tomcat', '4242')?.uid, first.uid);
    });

    test('the same explicit port on a Running record is accepted', async () => {
        const first = await coordinator.resolve(request({ port: 35000 }));
        inner.updateStatus(first.uid, 'Running', '');

        const second = await coordinator.resolve(request({ port: 35000 }));
        assert.equal(second.uid, first.uid);
    });

    test('a different port on a Running record is rejected and the record left unchanged', async () => {
        const first = await coordinator.resolve(request());
        inner.updateStatus(first.uid, 'Running', '');
        const before = inner.findByUid(first.uid);

        await assert.rejects(coordinator.resolve(request({ port: 35000 })), (err: unknown) => {
            assert.ok(err instanceof PreparationError);
            assert.equal(err.code, 'INVALID_INPUT');
            assert.equal(err.context.reason, 'conflicting_port');
            assert.match(err.message, /--port 34000/);
            return true;
        });

        assert.deepEqual(inner.findByUid(first.uid), before);
    });

    test('a record that is not Running starts a fresh cycle', async () => {
        const first = await coordinator.resolve(request());
        inner.updateStatus(first.uid, 'Error', 'connection refused');

        const second = await coordinator.resolve(request());

        assert.notEqual(second.uid, first.uid);
        assert.equal(second.port, '34001');
        assert.equal(inner.findByUid(second.uid)?.status, 'Created');
    });

    test('the pid comes from the resolver when only a name is given', async () => {
        resolver.livePid = '5151';
        const resolution = await coordinator.resolve(request());

        assert.equal(resolution.kind, 'attach');
        if (resolution.kind === 'attach') assert.equal(resolution.processId, '5151');
        assert.deepEqual(resolver.calls, [{ processName: 'tomcat', processId: '' }]);
    });

    test('a restarted target finds its earlier record by name', async () => {
        const first = await coordinator.resolve(request());
        inner.updateStatus(first.uid, 'Running', '');
        resolver.livePid = '5151';

        const second = await coordinator.resolve(request());

        assert.equal(second.kind, 'attach');
        if (second.kind === 'attach') {
            assert.equal(second.uid, first.uid);
            assert.equal(second.processId, '5151');
            assert.equal(second.record?.pid, '4242');
        }
    });

    test('explicit pids keep same-named processes on separate records', async () => {
        const first = await coordinator.resolve(request({ processId: '100' }));
        inner.updateStatus(first.uid, 'Running', '');

        const second = await coordinator.resolve(request({ processId: '200' }));
        inner.updateStatus(second.uid, 'Running', '');

        assert.notEqual(second.uid, first.uid);
        assert.equal(second.port, '34001');
        assert.equal(inner.findRecord('jvm', 'tomcat', '100', true)?.uid, first.uid);
        assert.equal(inner.findRecord('jvm', 'tomcat', '200', true)?.uid, second.uid);
        assert.equal(inner.findByUid(first.uid)?.pid, '100');
        assert.equal(inner.findByUid(second.uid)?.status, 'Running');
    });

    test('an explicit port for a second same-named process is not a conflict', async () => {
        const first = await coordinator.resolve(request({ processId: '100' }));
        inner.updateStatus(first.uid, 'Running', '');

        const second = await coordinator.resolve(request({ processId: '200', port: 35000 }));

        assert.equal(second.kind, 'attach');
        assert.notEqual(second.uid, first.uid);
        assert.equal(second.port, '35000');
    });

    test('the same explicit pid reuses its Running record', async () => {
        const first = await coordinator.resolve(request({ processId: '100' }));
        inner.updateStatus(first.uid, 'Running', '');

        const second = await coordinator.resolve(request({ processId: '100' }));

        assert.equal(second.uid, first.uid);
        assert.equal(ports.calls, 1);
    });

    test('resolver failures surface as TARGET_NOT_FOUND', async () => {
        const failing = new PreparationCoordinator({
            store,
            resolver: { resolve: async () => { throw new Error('tomcat process not found'); } },
            ports,
            dispatcher: new AsyncDispatcher(launcher, '/var/log/faultline'),
            asyncGraceMs: 0,
        });

        await assert.rejects(failing.resolve(request()), (err: unknown) => {
            assert.ok(err instanceof PreparationError);
            assert.equal(err.code, 'TARGET_NOT_FOUND');
            assert.equal(err.message, 'tomcat process not found');
            return true;
        });
    });

    test('port allocation failures surface as SERVER_ERROR', async () => {
        const failing = new PreparationCoordinator({
            store,
            resolver,
            ports: { allocate: async () => { throw new Error('EADDRINUSE'); } },
            dispatcher: new AsyncDispatcher(launcher, '/var/log/faultline'),
            asyncGraceMs: 0,
        });

        await assert.rejects(failing.resolve(request()), isCode('SERVER_ERROR'));
    });

    test('store failures surface as PERSISTENCE_ERROR', async () => {
        store.failing.add('findRecord');
        await assert.rejects(coordinator.resolve(request()), isCode('PERSISTENCE_ERROR'));

        store.failing.clear();
        store.failing.add('insertIfAbsent');
        await assert.rejects(coordinator.resolve(request()), isCode('PERSISTENCE_ERROR'));
    });

    test('async dispatches the detached child, waits the grace interval and short-circuits', async () => {
        const resolution = await coordinator.resolve(request({ async: true, endpoint: 'http://collector.test/report' }));

        assert.equal(resolution.kind, 'deferred');
        assert.deepEqual(sleeps, [1000]);
        assert.equal(launcher.launches.length, 1);
        assert.deepEqual(launcher.launches[0].argv, [
            'prepare', 'jvm', '--uid', resolution.uid, '--nohup',
            '--port', '34000',
            '--process', 'tomcat',
            '--pid', '4242',
            '--async',
            '--endpoint', 'http://collector.test/report',
        ]);
        assert.equal(launcher.launches[0].logFile, `/var/log/faultline/prepare-${resolution.uid}.log`);
        assert.equal(inner.findByUid(resolution.uid)?.status, 'Created');
    });

    test('a nohup run reuses the given uid and port without creating or spawning', async () => {
        const parent = await coordinator.resolve(request());

        const child = await coordinator.resolve(
            request({ nohup: true, async: true, uid: parent.uid, port: 34000, processId: '4242' })
        );

        assert.equal(child.kind, 'attach');
        assert.equal(child.uid, parent.uid);
        assert.equal(child.port, '34000');
        assert.equal(launcher.launches.length, 0);
        assert.deepEqual(sleeps, []);
        assert.equal(ports.calls, 1);
        if (child.kind === 'attach') assert.equal(child.record?.uid, parent.uid);
    });

    test('a nohup run without any known record is rejected', async () => {
        await assert.rejects(coordinator.resolve(request({ nohup: true })), isCode('INVALID_INPUT'));
    });
});
