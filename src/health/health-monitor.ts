import { BackendPool } from '../load-balancers/backend-pool';

export const HEALTH_CHECK_INTERVAL_MS = 2 * 60 * 1000;

// =================================================================
// HEALTH MONITOR
// =================================================================
//
// One background timer for the life of the process.
// Every tick runs a full pool health check to completion.
//
//   0:00  tick → probe A, B, C (sequential, up to 2s each)
//   2:00  tick → probe A, B, C
//
// If a cycle is still running when the next tick fires, that tick
// is skipped. Cycles never overlap.
// =================================================================

export class HealthMonitor {
    private timer: NodeJS.Timeout | null = null;
    private running = false;

    constructor(
        private pool: BackendPool,
        private interval: number = HEALTH_CHECK_INTERVAL_MS,
    ) {}

    start(): void {
        if (this.timer) return;

        this.timer = setInterval(() => {
            this.runOnce().catch((err: unknown) => {
                console.error(`Health check failed: ${err instanceof Error ? err.message : String(err)}`);
            });
        }, this.interval);
        // Don't keep the process alive just for health checks
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * Run one health check cycle. Returns false when a cycle was
     * already in progress and this one was skipped.
     */
    async runOnce(): Promise<boolean> {
        if (this.running) return false;

        this.running = true;
        try {
            console.log('Starting health check...');
            await this.pool.healthCheck();
            console.log('Health check completed');
        } finally {
            this.running = false;
        }
        return true;
    }
}
