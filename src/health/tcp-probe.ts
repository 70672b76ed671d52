import net from 'net';

export const PROBE_TIMEOUT_MS = 2000;

const DEFAULT_PORTS: Record<string, number> = {
    'http:': 80,
    'https:': 443,
};

// =================================================================
// TCP REACHABILITY PROBE
// =================================================================
// Alive = a TCP connection to host:port can be opened within the
// timeout. The socket is dropped right away.
//
// This only proves something is listening. A backend that accepts
// connections but answers every request with 500 still looks alive.
// =================================================================

export function isBackendAlive(address: URL, timeoutMs: number = PROBE_TIMEOUT_MS): Promise<boolean> {
    const port = address.port ? Number(address.port) : DEFAULT_PORTS[address.protocol] ?? 80;
    // URL keeps the brackets around IPv6 hosts, net.connect doesn't want them
    const host = address.hostname.replace(/^\[(.*)\]$/, '$1');

    return new Promise<boolean>((resolve) => {
        const socket = net.connect({ host, port });
        socket.setTimeout(timeoutMs);

        socket.once('connect', () => {
            socket.destroy();
            resolve(true);
        });

        socket.once('timeout', () => {
            socket.destroy(new Error(`connect timeout after ${timeoutMs}ms`));
        });

        socket.once('error', (err) => {
            console.log(`Site unreachable, error: ${err.message}`);
            socket.destroy();
            resolve(false);
        });
    });
}
