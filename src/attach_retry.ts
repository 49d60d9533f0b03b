/**
 * Attach Retry Engine
 *
 * One attach attempt, plus at most one retry when the agent refused the
 * connection and the port it actually bound can be read from the side channel.
 * A recovered port is written back to the record; that write is bookkeeping
 * and never downgrades a successful attach.
 */

import type { AttachClient } from './attach_client';
import { createLogger } from './logger';
import type { PreparationStore } from './preparation_store';
import { errorMessage } from './structured_error';
import type { PortLookup } from './token_port_lookup';

const log = createLogger('attach-retry');

const REFUSED_PATTERN = /connection refused/i;

export interface AttachAttempt {
    uid: string;
    port: string;
    javaHome: string;
    processId: string;
}

export interface AttachOutcome {
    success: boolean;
    message: string;
    /** Port of the last attempt (the recovered one after a retry) */
    port: string;
    retried: boolean;
}

export class AttachRetryEngine {
    constructor(
        private readonly client: AttachClient,
        private readonly portLookup: PortLookup,
        private readonly store: PreparationStore
    ) {}

    async attach(attempt: AttachAttempt): Promise<AttachOutcome> {
        const first = await this.client.attach({
            port: attempt.port,
            javaHome: attempt.javaHome,
            processId: attempt.processId,
        });

        if (first.success || !first.recoveredIdentity || !REFUSED_PATTERN.test(first.message)) {
            return { success: first.success, message: first.message, port: attempt.port, retried: false };
        }

        let recoveredPort: string;
        try {
            recoveredPort = await this.portLookup.lookup(first.recoveredIdentity);
        } catch (err) {
            log.info('no recoverable agent port, keeping original failure', {
                identity: first.recoveredIdentity,
                error: errorMessage(err),
            });
            return { success: false, message: first.message, port: attempt.port, retried: false };
        }
        if (!recoveredPort) {
            return { success: false, message: first.message, port: attempt.port, retried: false };
        }

        log.info(`use ${recoveredPort} port to retry`, { previous_port: attempt.port });
        const second = await this.client.attach({
            port: recoveredPort,
            javaHome: attempt.javaHome,
            processId: attempt.processId,
        });

        if (second.success && attempt.uid) {
            try {
                this.store.updatePort(attempt.uid, recoveredPort);
            } catch (err) {
                log.warn('update preparation port failed', { port: recoveredPort, error: errorMessage(err) });
            }
        }

        return { success: second.success, message: second.message, port: recoveredPort, retried: true };
    }
}
