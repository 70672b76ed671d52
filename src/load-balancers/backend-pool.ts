import { Backend } from './backend';
import type { ReachabilityProbe } from './types';
import { isBackendAlive } from '../health/tcp-probe';

// =================================================================
// BACKEND POOL: ROUND ROBIN OVER LIVE BACKENDS
// =================================================================
//
// Rotate through servers in order, skipping the dead ones:
//
//   [A, B(dead), C]
//   Request 1 → C   (cursor 1 is B, dead → scan on to C)
//   Request 2 → A
//   Request 3 → C
//
// Dead backends stay in the list. As soon as a health check
// marks them alive again they are back in rotation.
//
// The scan is bounded to one lap, so a fully dead pool returns
// null instead of spinning.
// =================================================================

export class BackendPool {
    private backends: Backend[] = [];
    private cursor = 0;

    constructor(private probe: ReachabilityProbe = isBackendAlive) {}

    addBackend(backend: Backend): void {
        this.backends.push(backend);
    }

    getBackends(): readonly Backend[] {
        return this.backends;
    }

    /**
     * Set the liveness of the backend with this address.
     * Returns false (and changes nothing) when no backend matches.
     */
    markBackendStatus(address: URL | string, alive: boolean): boolean {
        const backend = this.findBackend(address);
        if (!backend) return false;

        backend.setAlive(alive);
        return true;
    }

    // A string may be a full URL or just host:port
    private findBackend(address: URL | string): Backend | undefined {
        if (typeof address !== 'string') {
            return this.backends.find(b => b.address.href === address.href);
        }

        const href = normalizeHref(address);
        return this.backends.find(b => b.address.href === href || b.address.host === address);
    }

    nextPeer(): Backend | null {
        const total = this.backends.length;
        if (total === 0) return null;

        this.cursor++;
        const start = this.cursor % total;

        for (let i = start; i < start + total; i++) {
            const index = i % total;
            const backend = this.backends[index];

            if (backend.isAlive()) {
                // Skipped over dead ones, continue the rotation from here
                if (i !== start) this.cursor = index;
                return backend;
            }
        }

        return null;
    }

    /**
     * Probe every backend, one after the other, and record the result.
     */
    async healthCheck(): Promise<void> {
        for (const backend of this.backends) {
            const alive = await this.probe(backend.address);
            this.markBackendStatus(backend.address, alive);
            console.log(`${backend.address.href} [${alive ? 'up' : 'down'}]`);
        }
    }
}

function normalizeHref(address: string): string {
    try {
        return new URL(address).href;
    } catch {
        return address;
    }
}
