/**
 * Structured Error Schema for preparation failures
 *
 * Every failure the prepare flow can surface carries a machine-readable code,
 * the numeric code printed in the command response, and a context object.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Caller errors
    | 'INVALID_INPUT'
    | 'TARGET_NOT_FOUND'

    // Infrastructure errors
    | 'PERSISTENCE_ERROR'
    | 'SERVER_ERROR'

    // Agent errors
    | 'ATTACH_FAILURE';

export const RESPONSE_CODES: Record<ErrorCode, number> = {
    INVALID_INPUT: 45000,
    TARGET_NOT_FOUND: 45010,
    PERSISTENCE_ERROR: 47000,
    ATTACH_FAILURE: 48000,
    SERVER_ERROR: 50000,
};

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: 'FATAL' | 'ERROR';
    context: Record<string, unknown>;
    timestamp: string;
}

export class PreparationError extends Error {
    readonly timestamp = new Date().toISOString();

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly context: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'PreparationError';
    }

    get responseCode(): number {
        return RESPONSE_CODES[this.code];
    }

    toStructured(): StructuredError {
        return {
            code: this.code,
            message: this.message,
            severity: getSeverity(this.code),
            context: this.context,
            timestamp: this.timestamp,
        };
    }
}

function getSeverity(code: ErrorCode): 'FATAL' | 'ERROR' {
    const fatalCodes: ErrorCode[] = ['PERSISTENCE_ERROR', 'SERVER_ERROR'];
    return fatalCodes.includes(code) ? 'FATAL' : 'ERROR';
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes anything thrown inside the flow. Unknown errors become SERVER_ERROR.
 */
export function toPreparationError(err: unknown): PreparationError {
    if (err instanceof PreparationError) return err;
    return new PreparationError('SERVER_ERROR', errorMessage(err), {}, err);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static missingTarget(): PreparationError {
        return new PreparationError('INVALID_INPUT', 'less --process or --pid flags', { reason: 'missing_target' });
    }

    static conflictingPort(requested: number, stored: string): PreparationError {
        return new PreparationError(
            'INVALID_INPUT',
            `the process has been executed prepare command, if you want re-prepare, ` +
            `please append or modify the --port ${stored} argument in prepare command for retry`,
            { reason: 'conflicting_port', requested_port: requested, stored_port: stored }
        );
    }

    static invalidFlag(flag: string, value: string): PreparationError {
        return new PreparationError('INVALID_INPUT', `invalid value for ${flag}: ${value}`, { reason: 'invalid_flag', flag });
    }

    static targetNotFound(detail: string, context: Record<string, unknown> = {}): PreparationError {
        return new PreparationError('TARGET_NOT_FOUND', detail, context);
    }

    static persistence(operation: string, cause: unknown): PreparationError {
        return new PreparationError(
            'PERSISTENCE_ERROR',
            `${operation} err, ${errorMessage(cause)}`,
            { operation },
            cause
        );
    }

    static portAllocation(cause: unknown): PreparationError {
        return new PreparationError('SERVER_ERROR', `get sandbox port err, ${errorMessage(cause)}`, {}, cause);
    }

    static attachFailed(message: string, port: string): PreparationError {
        return new PreparationError('ATTACH_FAILURE', message, { port });
    }
}
