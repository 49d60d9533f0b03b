/**
 * Shared Configuration
 *
 * Centralized configuration for the faultline CLI.
 * Values can be overridden via environment variables.
 */

import * as os from 'os';
import * as path from 'path';

// Preparation kind stored on every record written by `prepare jvm`
export const PREPARE_JVM_TYPE = 'jvm';

// Type tag of the envelope posted to the reporting endpoint
export const REPORT_ENVELOPE_TYPE = 'JAVA_AGENT_PREPARE';

// Timeouts (milliseconds)
export const DEFAULT_TIMEOUTS = {
    ASYNC_GRACE_MS: 1000,       // parent waits this long after spawning the detached child
    ATTACH_MS: 60000,           // agent handshake
    REPORT_MS: 10000,           // result POST
};

export interface FaultlineConfig {
    /** Root directory for the database and async logs */
    home: string;
    dbPath: string;
    logDir: string;
    /** jvm-sandbox style agent distribution (contains lib/sandbox-core.jar) */
    agentHome: string;
    /** Namespace the agent registers under in ~/.sandbox.token */
    agentNamespace: string;
    asyncGraceMs: number;
    attachTimeoutMs: number;
    reportTimeoutMs: number;
}

function intFromEnv(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n >= 0 ? n : fallback;
}

/**
 * Build the configuration from an environment map (defaults to process.env).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FaultlineConfig {
    const home = env.FAULTLINE_HOME || path.join(env.HOME || env.USERPROFILE || os.homedir(), '.faultline');

    return {
        home,
        dbPath: env.FAULTLINE_DB || path.join(home, 'faultline.db'),
        logDir: path.join(home, 'logs'),
        agentHome: env.FAULTLINE_AGENT_HOME || path.join(home, 'lib', 'sandbox'),
        agentNamespace: env.FAULTLINE_AGENT_NAMESPACE || 'default',
        asyncGraceMs: intFromEnv(env.FAULTLINE_ASYNC_GRACE_MS, DEFAULT_TIMEOUTS.ASYNC_GRACE_MS),
        attachTimeoutMs: intFromEnv(env.FAULTLINE_ATTACH_TIMEOUT_MS, DEFAULT_TIMEOUTS.ATTACH_MS),
        reportTimeoutMs: intFromEnv(env.FAULTLINE_REPORT_TIMEOUT_MS, DEFAULT_TIMEOUTS.REPORT_MS),
    };
}
