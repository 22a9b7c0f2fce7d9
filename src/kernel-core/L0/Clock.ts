import type { ILedgerStore } from '../Ports.js';
import type { LogicalTime } from './Ontology.js';

export const DEFAULT_GENESIS_HEIGHT: LogicalTime = 1000;

/**
 * Ledger height used as the logical time of records and entries.
 * Persisted in the store so the height survives a restart; it only moves
 * forward, one step per accepted event.
 */
export class LogicalClock {
    constructor(
        private store: ILedgerStore,
        genesisHeight: LogicalTime = DEFAULT_GENESIS_HEIGHT
    ) {
        if (!Number.isSafeInteger(genesisHeight) || genesisHeight < 0) {
            throw new Error(`Clock Error: Invalid genesis height ${genesisHeight}`);
        }
        if (this.store.getClock() === undefined) {
            this.store.putClock(genesisHeight);
        }
    }

    public now(): LogicalTime {
        return this.store.getClock() ?? DEFAULT_GENESIS_HEIGHT;
    }

    public advance(): LogicalTime {
        const next = this.now() + 1;
        this.store.putClock(next);
        return next;
    }
}
