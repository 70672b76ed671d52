import type { Request, Response } from 'express';

/** One inbound request on its way to a backend. */
export interface Exchange {
    req: Request;
    res: Response;
    body?: Buffer; // Buffered once so a retry can replay it
}

/**
 * Delivers one request to one backend.
 * Resolves once the response has been handed to the client,
 * rejects with a ForwardError when the delivery failed.
 */
export type Forwarder = (exchange: Exchange) => Promise<void>;

/** Reachability test used by the health check: true means alive */
export type ReachabilityProbe = (address: URL) => Promise<boolean>;
