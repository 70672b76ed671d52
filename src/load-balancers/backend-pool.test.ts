import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Backend } from './backend';
import { BackendPool } from './backend-pool';

function backend(url: string, alive = true): Backend {
    return new Backend(new URL(url), vi.fn(async () => undefined), alive);
}

function poolOf(...backends: Backend[]): BackendPool {
    const pool = new BackendPool(async () => true);
    for (const b of backends) pool.addBackend(b);
    return pool;
}

describe('BackendPool', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    describe('nextPeer', () => {
        it('visits every live backend once per lap', () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002');
            const c = backend('http://c.test:3003');
            const pool = poolOf(a, b, c);

            const firstLap = [pool.nextPeer(), pool.nextPeer(), pool.nextPeer()];
            const secondLap = [pool.nextPeer(), pool.nextPeer(), pool.nextPeer()];

            expect(firstLap).toEqual([b, c, a]);
            expect(secondLap).toEqual([b, c, a]);
        });

        it('always returns the only live backend', () => {
            const a = backend('http://a.test:3001', false);
            const b = backend('http://b.test:3002');
            const c = backend('http://c.test:3003', false);
            const pool = poolOf(a, b, c);

            for (let i = 0; i < 7; i++) {
                expect(pool.nextPeer()).toBe(b);
            }
        });

        it('skips dead backends and keeps rotating among live ones', () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002', false);
            const c = backend('http://c.test:3003');
            const pool = poolOf(a, b, c);

            expect([pool.nextPeer(), pool.nextPeer(), pool.nextPeer(), pool.nextPeer()]).toEqual([c, a, c, a]);
        });

        it('returns null when every backend is dead', () => {
            const pool = poolOf(backend('http://a.test:3001', false), backend('http://b.test:3002', false));
            expect(pool.nextPeer()).toBeNull();
        });

        it('returns null for an empty pool', () => {
            expect(poolOf().nextPeer()).toBeNull();
        });

        it('puts a backend back in rotation once it is marked alive', () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002', false);
            const pool = poolOf(a, b);

            expect(pool.nextPeer()).toBe(a);
            pool.markBackendStatus(b.address, true);

            const picks = new Set([pool.nextPeer(), pool.nextPeer()]);
            expect(picks).toEqual(new Set([a, b]));
        });
    });

    describe('markBackendStatus', () => {
        it('flips the liveness of the matching backend', () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002');
            const pool = poolOf(a, b);

            expect(pool.markBackendStatus(new URL('http://a.test:3001'), false)).toBe(true);
            expect(a.isAlive()).toBe(false);
            expect(b.isAlive()).toBe(true);
        });

        it('accepts the address as a string', () => {
            const a = backend('http://a.test:3001');
            const pool = poolOf(a);

            expect(pool.markBackendStatus('http://a.test:3001', false)).toBe(true);
            expect(a.isAlive()).toBe(false);
        });

        it('leaves everything alone for an unknown address', () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002', false);
            const pool = poolOf(a, b);

            expect(pool.markBackendStatus(new URL('http://unknown.test:9999'), false)).toBe(false);
            expect(pool.markBackendStatus(new URL('http://unknown.test:9999'), true)).toBe(false);
            expect(a.isAlive()).toBe(true);
            expect(b.isAlive()).toBe(false);
        });

        it('returns false for an address that is not a URL', () => {
            const a = backend('http://a.test:3001');
            const pool = poolOf(a);

            expect(pool.markBackendStatus('backend-a', false)).toBe(false);
            expect(a.isAlive()).toBe(true);
        });

        it('matches a bare host:port', () => {
            const a = backend('http://a.test:3001');
            const pool = poolOf(a);

            expect(pool.markBackendStatus('a.test:3001', false)).toBe(true);
            expect(a.isAlive()).toBe(false);
        });
    });

    describe('healthCheck', () => {
        it('probes every backend in order and records the result', async () => {
            const a = backend('http://a.test:3001');
            const b = backend('http://b.test:3002', false);
            const probe = vi.fn(async (address: URL) => address.hostname === 'b.test');
            const pool = new BackendPool(probe);
            pool.addBackend(a);
            pool.addBackend(b);

            await pool.healthCheck();

            expect(probe.mock.calls.map(([url]) => url.host)).toEqual(['a.test:3001', 'b.test:3002']);
            expect(a.isAlive()).toBe(false);
            expect(b.isAlive()).toBe(true);
            expect(console.log).toHaveBeenCalledWith('http://a.test:3001/ [down]');
            expect(console.log).toHaveBeenCalledWith('http://b.test:3002/ [up]');
        });
    });
});
