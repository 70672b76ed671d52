// =================================================================
// Start everything for a local demo: 3 backends + load balancer
// =================================================================

import { startBackend } from './demo/backends';
import { startLoadBalancer } from './main';
import { loadConfig } from './config';

const DEMO_BACKENDS = [
    { port: 3001, name: 'Backend-A' },
    { port: 3002, name: 'Backend-B' },
    { port: 3003, name: 'Backend-C' },
];

async function startAll(): Promise<void> {
    console.log('');
    console.log('🚀 Starting demo backends...');
    console.log('');

    await Promise.all(DEMO_BACKENDS.map(b => startBackend(b.port, b.name)));

    const backends = DEMO_BACKENDS.map(b => `http://localhost:${b.port}`).join(',');
    await startLoadBalancer(loadConfig(['--backends', backends, ...process.argv.slice(2)]));
}

startAll().catch((err: unknown) => {
    console.error(`Demo failed to start: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
