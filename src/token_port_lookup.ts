/**
 * Side-channel port recovery.
 *
 * A running agent writes `namespace;token;ip;port` lines into the owner's
 * ~/.sandbox.token. When an attach is refused, the port the agent actually
 * bound is read back from there.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface PortLookup {
    /** Resolves to the bound port for the identity; rejects when none is known. */
    lookup(identity: string): Promise<string>;
}

export const TOKEN_FILE_NAME = '.sandbox.token';

/**
 * Port of the last entry registered under the namespace, or null.
 */
export function parseTokenFile(content: string, namespace: string): string | null {
    let port: string | null = null;
    for (const raw of content.split('\n')) {
        const parts = raw.trim().split(';');
        if (parts.length < 4 || parts[0] !== namespace) continue;
        const candidate = parts[3].trim();
        if (/^\d+$/.test(candidate) && Number(candidate) > 0 && Number(candidate) < 65536) {
            port = candidate;
        }
    }
    return port;
}

export type HomeResolver = (identity: string) => string;

/** `root` lives in /root, everybody else under /home. */
export const defaultHomeResolver: HomeResolver = (identity) =>
    identity === 'root' ? '/root' : path.join('/home', identity);

export class SandboxTokenPortLookup implements PortLookup {
    constructor(
        private readonly namespace: string,
        private readonly homeOf: HomeResolver = defaultHomeResolver
    ) {}

    async lookup(identity: string): Promise<string> {
        const tokenFile = path.join(this.homeOf(identity), TOKEN_FILE_NAME);
        const content = await fs.promises.readFile(tokenFile, 'utf8');
        const port = parseTokenFile(content, this.namespace);
        if (!port) {
            throw new Error(`no ${this.namespace} port in ${tokenFile}`);
        }
        return port;
    }
}
