import http from 'http';
import https from 'https';
import type { Exchange, Forwarder } from '../load-balancers/types';
import { ForwardError } from '../errors';

export const FORWARD_TIMEOUT_MS = 5000;

export interface HttpForwarderOptions {
    timeoutMs?: number; // Idle socket timeout before the backend counts as failed
}

// The body was buffered and decoded by express.raw; these no longer describe it
const DROPPED_HEADERS = ['content-length', 'content-encoding', 'transfer-encoding'];

// =================================================================
// HTTP FORWARDER: sends one request to one backend
// =================================================================
// Same method, path, query, headers and body as the client sent,
// with Host rewritten to the backend. The backend's answer, 5xx
// included, is piped straight back to the client.
//
// Failures BEFORE the backend answers (refused, reset, timeout)
// reject with a ForwardError so the request can be retried.
// =================================================================

export function createHttpForwarder(target: URL, options: HttpForwarderOptions = {}): Forwarder {
    const timeout = options.timeoutMs ?? FORWARD_TIMEOUT_MS;
    const transport = target.protocol === 'https:' ? https : http;
    const basePath = target.pathname.replace(/\/$/, '');

    return ({ req, res, body }: Exchange) => new Promise<void>((resolve, reject) => {
        const startTime = Date.now();
        let settled = false;

        const fail = (message: string, responseStarted: boolean) => {
            if (settled) return;
            settled = true;
            reject(new ForwardError(target.host, message, responseStarted));
        };

        const headers: http.OutgoingHttpHeaders = { ...req.headers };
        for (const name of DROPPED_HEADERS) delete headers[name];
        headers.host = target.host;
        if (body && body.length > 0) headers['content-length'] = body.length;

        const backendReq = transport.request({
            protocol: target.protocol,
            hostname: target.hostname.replace(/^\[(.*)\]$/, '$1'),
            port: target.port || undefined,
            path: basePath + req.originalUrl,
            method: req.method,
            headers,
            timeout,
        }, (backendRes) => {
            const elapsed = Date.now() - startTime;

            res.setHeader('x-backend', target.host);
            res.setHeader('x-response-time', `${elapsed}ms`);
            res.writeHead(backendRes.statusCode || 502, backendRes.headers);
            backendRes.pipe(res);

            backendRes.on('error', (err) => fail(err.message, true));
            backendRes.on('end', () => {
                if (settled) return;
                settled = true;
                resolve();
            });
            // Client went away mid-response; nothing left to deliver
            res.on('close', () => {
                if (settled) return;
                settled = true;
                backendReq.destroy();
                resolve();
            });
        });

        backendReq.on('timeout', () => {
            backendReq.destroy(new Error(`${target.host} did not respond within ${timeout}ms`));
        });

        backendReq.on('error', (err) => fail(err.message, res.headersSent));

        backendReq.end(body && body.length > 0 ? body : undefined);
    });
}
