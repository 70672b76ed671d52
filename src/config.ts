import { parseArgs } from 'util';
import { ConfigError } from './errors';
import { HEALTH_CHECK_INTERVAL_MS } from './health/health-monitor';
import { FORWARD_TIMEOUT_MS } from './forwarding/http-forwarder';

export interface LoadBalancerConfig {
    backends: URL[];
    port: number;
    healthInterval: number; // ms between health check cycles
    forwardTimeout: number; // ms before a silent backend counts as failed
}

export const DEFAULT_PORT = 3030;
const MAX_PORT = 65535;

// =================================================================
// CONFIGURATION
// =================================================================
//
//   --backends=http://localhost:3001,http://localhost:3002   (required)
//   --port=3030
//   --health-interval=120000
//   --forward-timeout=5000
//
// Every flag falls back to an environment variable (LB_BACKENDS,
// LB_PORT, LB_HEALTH_INTERVAL_MS, LB_FORWARD_TIMEOUT_MS), which
// main.ts may have loaded from .env.
// =================================================================

export function loadConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): LoadBalancerConfig {
    const values = parseFlags(argv);
    const serverList = values.backends ?? env.LB_BACKENDS ?? '';

    return {
        backends: parseBackends(serverList),
        port: parseNumber('port', values.port ?? env.LB_PORT, DEFAULT_PORT, 0, MAX_PORT),
        healthInterval: parseNumber('health-interval', values['health-interval'] ?? env.LB_HEALTH_INTERVAL_MS, HEALTH_CHECK_INTERVAL_MS, 1),
        forwardTimeout: parseNumber('forward-timeout', values['forward-timeout'] ?? env.LB_FORWARD_TIMEOUT_MS, FORWARD_TIMEOUT_MS, 1),
    };
}

function parseFlags(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                backends: { type: 'string' },
                port: { type: 'string' },
                'health-interval': { type: 'string' },
                'forward-timeout': { type: 'string' },
            },
            strict: true,
        }).values;
    } catch (err) {
        throw new ConfigError(err instanceof Error ? err.message : String(err));
    }
}

export function parseBackends(serverList: string): URL[] {
    const servers = serverList.split(',').map(s => s.trim()).filter(s => s.length > 0);
    if (servers.length === 0) {
        throw new ConfigError('Please provide one or more backends to load balance');
    }

    return servers.map((server) => {
        let url: URL;
        try {
            url = new URL(server);
        } catch {
            throw new ConfigError(`Invalid backend URL: ${server}`);
        }

        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            throw new ConfigError(`Unsupported backend scheme ${url.protocol} in ${server}`);
        }
        return url;
    });
}

function parseNumber(
    flag: string,
    raw: string | undefined,
    fallback: number,
    min: number,
    max: number = Number.MAX_SAFE_INTEGER,
): number {
    if (raw === undefined || raw === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        const range = max === Number.MAX_SAFE_INTEGER ? `an integer >= ${min}` : `an integer between ${min} and ${max}`;
        throw new ConfigError(`--${flag} must be ${range}, got "${raw}"`);
    }
    return value;
}
