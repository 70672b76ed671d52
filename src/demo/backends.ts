import http from 'http';
import express from 'express';

// =================================================================
// DEMO BACKENDS: simple services to balance across
// =================================================================
//
// Each one echoes what it received and says who it is, so you can
// watch the rotation (and the failover when you kill one):
//
//   curl localhost:3030/api/users   → Backend-A
//   curl localhost:3030/api/users   → Backend-B
//   curl localhost:3030/api/users   → Backend-C
//
// Tests reuse them as in-process upstreams.
// =================================================================

export function createBackend(name: string) {
    const app = express();
    app.use(express.text({ type: () => true }));

    app.get('/api/health', (req, res) => {
        res.json({
            server: name,
            status: 'healthy',
            uptime: process.uptime(),
        });
    });

    app.all('/{*path}', (req, res) => {
        res.json({
            server: name,
            method: req.method,
            path: req.path,
            query: req.query,
            body: typeof req.body === 'string' ? req.body : '',
            headers: {
                host: req.headers.host,
                'user-agent': req.headers['user-agent'],
            },
            timestamp: new Date().toISOString(),
        });
    });

    return app;
}

/** Start a demo backend; port 0 picks a free port. */
export function startBackend(port: number, name: string): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = createBackend(name).listen(port, (err?: Error) => {
            if (err) {
                reject(err);
                return;
            }
            console.log(`   ${name} running on http://localhost:${port}`);
            resolve(server);
        });
    });
}
