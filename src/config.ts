// ============================================================================
// LEDGER CONFIGURATION
// Environment variable overrides with local defaults
// ============================================================================

import { DEFAULT_GENESIS_HEIGHT } from './kernel-core/L0/Clock.js';

function readInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed) || parsed < 0) {
        throw new Error(`Config Error: expected a non-negative integer, got '${value}'`);
    }
    return parsed;
}

export interface LedgerConfig {
    ledger: {
        /** Identity fixed as owner when a store is first created. */
        owner: string;
        genesisHeight: number;
        quiet: boolean;
    };
    storage: {
        /** better-sqlite3 path; ':memory:' keeps nothing on disk. */
        path: string;
    };
    server: {
        port: number;
        host: string;
    };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
    return {
        ledger: {
            owner: env.LEDGER_OWNER || 'deployer',
            genesisHeight: readInt(env.LEDGER_GENESIS_HEIGHT, DEFAULT_GENESIS_HEIGHT),
            quiet: env.LEDGER_QUIET === 'true'
        },
        storage: {
            path: env.LEDGER_DB_PATH || 'ledger.db'
        },
        server: {
            port: readInt(env.PORT, 3000),
            host: env.HOST || '127.0.0.1'
        }
    };
}
