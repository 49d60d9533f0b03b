/**
 * `prepare jvm` flow: coordinator -> attach (with retry) -> record bookkeeping
 * -> optional report. Every outcome ends as one CommandResponse.
 */

import type { AttachOutcome, AttachRetryEngine } from './attach_retry';
import { createLogger } from './logger';
import type { PrepareRequest, PreparationCoordinator, Resolution } from './preparation_coordinator';
import type { PreparationRecord, PreparationStore } from './preparation_store';
import { type CommandResponse, failureResponse, successResponse } from './response';
import type { ResultReporter } from './result_reporter';
import { ErrorFactory, PreparationError, errorMessage, toPreparationError } from './structured_error';

const log = createLogger('prepare-jvm');

export interface PrepareCommandDeps {
    store: PreparationStore;
    coordinator: PreparationCoordinator;
    retry: AttachRetryEngine;
    reporter: ResultReporter;
}

export class PrepareCommand {
    constructor(private readonly deps: PrepareCommandDeps) {}

    async run(req: PrepareRequest): Promise<CommandResponse> {
        let resolution: Resolution;
        try {
            resolution = await this.deps.coordinator.resolve(req);
        } catch (err) {
            const failure = toPreparationError(err);
            log.warn('prepare rejected', { ...failure.toStructured() });
            return failureResponse(failure);
        }

        if (resolution.kind === 'deferred') {
            // the detached child reports the attach outcome
            return successResponse(resolution.uid);
        }

        const { uid, port, processId, record } = resolution;
        const outcome = await this.attach(uid, port, req.javaHome, processId);

        if (record && record.pid !== processId) {
            try {
                this.deps.store.updatePid(uid, processId);
                log.info('corrected preparation pid', { from: record.pid, to: processId });
            } catch (err) {
                log.warn('update preparation pid failed', { pid: processId, error: errorMessage(err) });
            }
        }

        const { response, recordUid } = this.recordOutcome(uid, outcome);

        if (req.async && req.endpoint) {
            await this.deps.reporter.report(req.endpoint, recordUid);
        }
        return response;
    }

    private async attach(uid: string, port: string, javaHome: string, processId: string): Promise<AttachOutcome> {
        try {
            return await this.deps.retry.attach({ uid, port, javaHome, processId });
        } catch (err) {
            return { success: false, message: errorMessage(err), port, retried: false };
        }
    }

    /**
     * Running on success, Error with the attach message on failure. A failed
     * Running write is the response, unless a concurrent run already holds the
     * Running record for the target: then that record answers. A failed Error
     * write is only logged.
     */
    private recordOutcome(uid: string, outcome: AttachOutcome): { response: CommandResponse; recordUid: string } {
        if (outcome.success) {
            try {
                this.deps.store.updateStatus(uid, 'Running', '');
            } catch (err) {
                const winner = this.concurrentRunning(uid);
                if (winner) {
                    log.warn('a concurrent prepare holds the running record', { winner: winner.uid });
                    this.markError(uid, `superseded by ${winner.uid}`);
                    return { response: successResponse(winner.uid), recordUid: winner.uid };
                }
                const failure = err instanceof PreparationError
                    ? err
                    : ErrorFactory.persistence('update preparation status', err);
                return { response: failureResponse(failure), recordUid: uid };
            }
            log.info('attach java agent success', { port: outcome.port, retried: outcome.retried });
            return { response: successResponse(uid), recordUid: uid };
        }

        this.markError(uid, outcome.message);
        log.warn('attach java agent failed', { port: outcome.port, error: outcome.message });
        return { response: failureResponse(ErrorFactory.attachFailed(outcome.message, outcome.port)), recordUid: uid };
    }

    private markError(uid: string, message: string): void {
        try {
            this.deps.store.updateStatus(uid, 'Error', message);
        } catch (err) {
            log.warn('update preparation status failed', { error: errorMessage(err) });
        }
    }

    /** The Running record of the same target held by another uid, if any. */
    private concurrentRunning(uid: string): PreparationRecord | null {
        try {
            const own = this.deps.store.findByUid(uid);
            if (!own) return null;
            const running = this.deps.store.findRecord(own.programType, own.process, own.pid, true);
            return running && running.uid !== uid && running.status === 'Running' ? running : null;
        } catch (err) {
            log.warn('query concurrent preparation failed', { error: errorMessage(err) });
            return null;
        }
    }
}
