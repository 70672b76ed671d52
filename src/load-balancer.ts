import express, { type Request, type Response, type NextFunction } from 'express';
import type { Dispatcher } from './dispatcher';
import { accessLogger } from './middleware/logger';

export interface LoadBalancerAppOptions {
    bodyLimit?: string; // Max buffered request body, express.raw syntax
}

// =================================================================
// LOAD BALANCER HTTP SURFACE
// =================================================================
//
//   accessLogger  → logs every request once it finishes
//   express.raw   → buffers the body so retries can replay it
//   /{*path}      → every method, every path → Dispatcher
//   error handler → anything unexpected becomes a 500
// =================================================================

export function createLoadBalancerApp(dispatcher: Dispatcher, options: LoadBalancerAppOptions = {}) {
    const app = express();
    app.disable('x-powered-by');

    app.use(accessLogger);
    app.use(express.raw({ type: () => true, limit: options.bodyLimit ?? '10mb' }));

    app.all('/{*path}', async (req: Request, res: Response) => {
        await dispatcher.handle(req, res);
    });

    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        console.error(`Load balancer error: ${err.message}`);

        // body-parser errors (413 and friends) carry their own status
        const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;

        if (!res.headersSent) {
            res.status(status).json({
                error: 'Internal Load Balancer Error',
                message: err.message,
            });
        }
    });

    return app;
}
