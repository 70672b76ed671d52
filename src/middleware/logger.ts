import type { Request, Response, NextFunction } from 'express';

// =================================================================
// ACCESS LOG MIDDLEWARE
// =================================================================
// Mounted first so every request is logged, 503s included.
// Logs once the response is finished, with the backend that
// served it (set by the dispatcher) and the elapsed time.
// =================================================================

export function accessLogger(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();

    res.on('finish', () => {
        const elapsed = Date.now() - startTime;
        const backend = typeof res.locals.backend === 'string' ? res.locals.backend : 'none';
        console.log(
            `${req.method} ${req.originalUrl} → ${backend} [${res.statusCode}] ${elapsed}ms`
        );
    });

    next();
}
