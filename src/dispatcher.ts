import type { Request, Response } from 'express';
import type { BackendPool } from './load-balancers/backend-pool';
import type { Exchange } from './load-balancers/types';
import { type EscalationState, type RetryEscalator, initialEscalation, nextAttempt } from './retry/retry-escalator';

// =================================================================
// DISPATCHER: entry point for every inbound request
// =================================================================
//
//   request → attempts over budget?  → 503
//           → pool.nextPeer()        → none? 503
//           → escalator.forward(peer)
//                 delivered → done
//                 escalate  → dispatch again with attempts + 1
//
// "All backends dead" and "too many backends tried" look the same
// to the client.
// =================================================================

export class Dispatcher {
    constructor(
        private pool: BackendPool,
        private escalator: RetryEscalator,
    ) {}

    async handle(req: Request, res: Response): Promise<void> {
        const body: Buffer | undefined = Buffer.isBuffer(req.body) ? req.body : undefined;
        await this.dispatch({ req, res, body }, initialEscalation());
    }

    async dispatch(exchange: Exchange, state: EscalationState): Promise<void> {
        const { req, res } = exchange;

        if (state.attempts > this.escalator.policy.maxAttempts) {
            console.log(`${req.ip ?? 'unknown'}(${req.path}) Max attempts reached, terminating`);
            serviceUnavailable(res);
            return;
        }

        const peer = this.pool.nextPeer();
        if (!peer) {
            console.log(`${req.ip ?? 'unknown'}(${req.path}) No live backend`);
            serviceUnavailable(res);
            return;
        }

        res.locals.backend = peer.host;

        const outcome = await this.escalator.forward(peer, exchange, state);
        if (outcome === 'escalate') {
            await this.dispatch(exchange, nextAttempt(state));
        }
    }
}

function serviceUnavailable(res: Response): void {
    // No backend served this one, even if earlier attempts picked some
    res.locals.backend = undefined;
    res.status(503).type('text/plain').send('Service not available');
}
