import type { Forwarder } from './types';

// =================================================================
// BACKEND: one upstream server
// =================================================================
//
// The address never changes. The alive flag is flipped by the
// health check and by the retry escalator, and read on every
// request by the pool. Node runs all of those on one event loop,
// so a single read or write is atomic; the accessors are the only
// way in.
// =================================================================

export class Backend {
    private alive: boolean;

    constructor(
        public readonly address: URL,
        public readonly forward: Forwarder,
        alive: boolean = true,
    ) {
        this.alive = alive;
    }

    isAlive(): boolean {
        return this.alive;
    }

    setAlive(alive: boolean): void {
        this.alive = alive;
    }

    /** host:port, used in logs and the x-backend header */
    get host(): string {
        return this.address.host;
    }
}
