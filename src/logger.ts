/**
 * Structured Logger for faultline
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when FAULTLINE_LOG_JSON=1
 * - Optional file output via FAULTLINE_LOG_FILE
 * - Module context (component name) on every line
 * - Preparation correlation id (uid) propagated through all log entries
 *
 * Every line goes to stderr: stdout is reserved for the command response.
 *
 * Environment:
 *   FAULTLINE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   FAULTLINE_LOG_JSON   = 1 (default: text)
 *   FAULTLINE_LOG_FILE   = path (optional, appends)
 *   FAULTLINE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.FAULTLINE_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.FAULTLINE_DEBUG === '1' || process.env.FAULTLINE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.FAULTLINE_LOG_JSON === '1';
const LOG_FILE = process.env.FAULTLINE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation Context (singleton)                                            */
/* -------------------------------------------------------------------------- */

let _uid: string = '';
let _target: string = '';

/** Set the active preparation context. Called once the record uid is known. */
export function setCorrelation(opts: { uid?: string; target?: string }): void {
    if (opts.uid !== undefined) _uid = opts.uid;
    if (opts.target !== undefined) _target = opts.target;
}

export function clearCorrelation(): void {
    _uid = '';
    _target = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_uid) entry.uid = _uid;
        if (_target) entry.target = _target;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _uid ? ` [${_uid.slice(0, 8)}${_target ? '/' + _target : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            process.stderr.write(`log file write failed: ${String(err)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
    };
}
