import type { Backend } from '../load-balancers/backend';
import type { BackendPool } from '../load-balancers/backend-pool';
import type { Exchange } from '../load-balancers/types';
import { ForwardError } from '../errors';

// =================================================================
// RETRY ESCALATOR
// =================================================================
//
// What happens when a forwarded request fails:
//
//   1. RETRY: same backend, after a short fixed delay.
//      Up to maxRetries times (1 initial try + 3 retries = 4 calls).
//
//   2. ESCALATE: the backend is marked dead for everyone and the
//      dispatcher picks a different live backend. The new backend
//      starts with a fresh retry budget.
//
//   3. GIVE UP: once more than maxAttempts backends have been
//      escalated away from, or no backend is alive, the dispatcher
//      answers 503.
//
//   Forwarding(A) ─fail→ wait 10ms → Forwarding(A) ... ×3
//                 ─fail→ mark A dead → dispatch → Forwarding(B)
//
// Each request carries its own EscalationState. It is a value:
// every step produces a new one, nothing is shared.
// =================================================================

export interface EscalationState {
    readonly attempts: number; // Distinct backends escalated away from
    readonly retries: number; // Same-backend retries for the current backend
}

export interface RetryPolicy {
    maxRetries: number;
    maxAttempts: number;
    /** Delay in ms before retry number `retry` (0-based) */
    retryDelay: (retry: number) => number;
}

export const RETRY_DELAY_MS = 10;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 3,
    maxAttempts: 3,
    retryDelay: () => RETRY_DELAY_MS,
};

export type ForwardOutcome = 'delivered' | 'escalate';

export function initialEscalation(): EscalationState {
    return { attempts: 0, retries: 0 };
}

export function nextRetry(state: EscalationState): EscalationState {
    return { ...state, retries: state.retries + 1 };
}

/** A fresh backend gets its own retry budget */
export function nextAttempt(state: EscalationState): EscalationState {
    return { attempts: state.attempts + 1, retries: 0 };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RetryEscalator {
    constructor(
        private pool: BackendPool,
        readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    ) {}

    /**
     * Forward to one backend, retrying it until the retry budget is spent.
     * 'escalate' means the backend has been marked dead and the caller
     * should pick another one.
     */
    async forward(backend: Backend, exchange: Exchange, initial: EscalationState): Promise<ForwardOutcome> {
        const { req, res } = exchange;
        let state = initial;

        for (;;) {
            try {
                await backend.forward(exchange);
                return 'delivered';
            } catch (err) {
                if (!(err instanceof ForwardError)) throw err;

                console.error(`[${backend.host}] error: ${err.message}`);

                // Part of the response already went out, nothing to replay onto
                if (err.responseStarted || res.headersSent) {
                    if (!res.writableEnded) res.destroy();
                    return 'delivered';
                }

                if (state.retries < this.policy.maxRetries) {
                    await sleep(this.policy.retryDelay(state.retries));
                    state = nextRetry(state);
                    continue;
                }
            }

            this.pool.markBackendStatus(backend.address, false);
            console.log(`${req.ip ?? 'unknown'}(${req.path}) Attempting retry ${state.attempts}`);
            return 'escalate';
        }
    }
}
