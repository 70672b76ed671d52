#!/usr/bin/env node
import http from 'http';
import dotenv from 'dotenv';
import { type LoadBalancerConfig, loadConfig } from './config';
import { ConfigError } from './errors';
import { Backend } from './load-balancers/backend';
import { BackendPool } from './load-balancers/backend-pool';
import { createHttpForwarder } from './forwarding/http-forwarder';
import { HealthMonitor } from './health/health-monitor';
import { RetryEscalator } from './retry/retry-escalator';
import { Dispatcher } from './dispatcher';
import { createLoadBalancerApp } from './load-balancer';

export interface RunningLoadBalancer {
    server: http.Server;
    pool: BackendPool;
    monitor: HealthMonitor;
    close(): Promise<void>;
}

/**
 * Wire pool, forwarders, monitor and dispatcher together and start listening.
 * Resolves once the server is bound.
 */
export function startLoadBalancer(config: LoadBalancerConfig): Promise<RunningLoadBalancer> {
    const pool = new BackendPool();

    for (const url of config.backends) {
        pool.addBackend(new Backend(url, createHttpForwarder(url, { timeoutMs: config.forwardTimeout })));
        console.log(`Configured server: ${url.href}`);
    }

    const dispatcher = new Dispatcher(pool, new RetryEscalator(pool));
    const app = createLoadBalancerApp(dispatcher);
    const monitor = new HealthMonitor(pool, config.healthInterval);

    return new Promise((resolve, reject) => {
        const server = app.listen(config.port, (err?: Error) => {
            if (err) {
                reject(err);
                return;
            }

            monitor.start();

            console.log('');
            console.log('='.repeat(65));
            console.log(`Load Balancer started at :${config.port}`);
            console.log('='.repeat(65));
            console.log(`  Backends: ${config.backends.map(b => b.host).join(', ')}`);
            console.log(`  Health check: every ${config.healthInterval / 1000}s`);
            console.log('');

            resolve({
                server,
                pool,
                monitor,
                close: () => new Promise<void>((done, fail) => {
                    monitor.stop();
                    server.close((closeErr) => (closeErr ? fail(closeErr) : done()));
                }),
            });
        });
    });
}

async function main(): Promise<void> {
    dotenv.config();

    const config = loadConfig();
    const lb = await startLoadBalancer(config);

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`);
        lb.close().then(
            () => process.exit(0),
            (err: Error) => {
                console.error(`Shutdown failed: ${err.message}`);
                process.exit(1);
            },
        );
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch((err: unknown) => {
        if (err instanceof ConfigError) {
            console.error(err.message);
        } else {
            console.error(`Load balancer failed to start: ${err instanceof Error ? err.message : String(err)}`);
        }
        process.exit(1);
    });
}
