/**
 * Result Reporter: best-effort POST of the final record to the caller's endpoint.
 *
 * Envelope:
 *   { "data": <record>, "type": "JAVA_AGENT_PREPARE" }
 *
 * report() never rejects; failures come back as a FAILED or REJECTED outcome.
 */

import { REPORT_ENVELOPE_TYPE } from './config';
import { createLogger } from './logger';
import { type PreparationStore, recordToJson } from './preparation_store';
import { errorMessage } from './structured_error';

const log = createLogger('result-reporter');

export type ReportStatus = 'SENT' | 'SKIPPED' | 'REJECTED' | 'FAILED';

export interface ReportOutcome {
    status: ReportStatus;
    httpStatus: number | null;
    detail: string;
}

/**
 * Builds the POST body for a record uid, or throws when it cannot.
 */
export function createPostBody(store: PreparationStore, uid: string): string {
    const record = store.findByUid(uid);
    if (!record) {
        throw new Error(`preparation record not found: ${uid}`);
    }
    return JSON.stringify({ data: recordToJson(record), type: REPORT_ENVELOPE_TYPE });
}

export class ResultReporter {
    constructor(
        private readonly store: PreparationStore,
        private readonly timeoutMs: number
    ) {}

    async report(endpoint: string, uid: string): Promise<ReportOutcome> {
        if (!endpoint) {
            return { status: 'SKIPPED', httpStatus: null, detail: 'no endpoint' };
        }

        let body: string;
        try {
            body = createPostBody(this.store, uid);
        } catch (err) {
            log.warn('create java install post body failed', { uid, error: errorMessage(err) });
            return { status: 'SKIPPED', httpStatus: null, detail: errorMessage(err) };
        }
        log.info('report attach result', { endpoint, body });

        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), this.timeoutMs);

        try {
            const resp = await fetch(endpoint, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body,
                signal: ac.signal,
            });
            const text = await resp.text();

            if (resp.status !== 200) {
                log.warn(`response code is ${resp.status}`, { endpoint, result: text });
                return { status: 'REJECTED', httpStatus: resp.status, detail: text };
            }
            log.info('report java install result success', { endpoint, result: text });
            return { status: 'SENT', httpStatus: resp.status, detail: text };
        } catch (err) {
            const detail = ac.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
            log.warn('report java install result failed', { endpoint, error: detail });
            return { status: 'FAILED', httpStatus: null, detail };
        } finally {
            clearTimeout(tid);
        }
    }
}
