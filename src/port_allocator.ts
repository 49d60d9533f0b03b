// port_allocator.ts - picks a free local port for the agent server

import * as net from 'net';

export interface PortAllocator {
    allocate(): Promise<number>;
}

/**
 * Binds port 0 on the loopback interface, reads the port the kernel assigned
 * and releases it again.
 */
export class LocalPortAllocator implements PortAllocator {
    constructor(private readonly host: string = '127.0.0.1') {}

    allocate(): Promise<number> {
        return new Promise<number>((resolve, reject) => {
            const server = net.createServer();
            server.unref();
            server.once('error', reject);
            server.listen(0, this.host, () => {
                const address = server.address();
                const port = address !== null && typeof address === 'object' ? address.port : 0;
                server.close((closeErr) => {
                    if (closeErr) {
                        reject(closeErr);
                    } else if (port <= 0) {
                        reject(new Error(`no port assigned on ${this.host}`));
                    } else {
                        resolve(port);
                    }
                });
            });
        });
    }
}
