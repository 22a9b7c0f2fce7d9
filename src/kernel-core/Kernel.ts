import type { IdentityID, LogicalTime } from './L0/Ontology.js';
import { LogicalClock } from './L0/Clock.js';
import { AdminControl } from './L1/AdminControl.js';
import { OracleRegistry } from './L1/OracleRegistry.js';
import { RoleRegistry } from './L1/RoleRegistry.js';
import { DeliveryLedger } from './L2/DeliveryLedger.js';
import { QueryService } from './L3/QueryService.js';
import { AuditLog } from './L5/Audit.js';
import type { ILedgerStore } from './Ports.js';
import { MemoryLedgerStore } from '../infrastructure/persistence/MemoryLedgerStore.js';

export interface LedgerKernelOptions {
    /** Ledger owner; only used when the store has no admin state yet. */
    owner: IdentityID;
    /** Defaults to a fresh in-memory store. */
    store?: ILedgerStore;
    genesisHeight?: LogicalTime;
    /** Silence per-rejection warnings. */
    quiet?: boolean;
}

/**
 * Composition root. Owns the single store and clock and threads them, with
 * the admin state, into every component; nothing below reads global state.
 */
export class LedgerKernel {
    public readonly store: ILedgerStore;
    public readonly clock: LogicalClock;
    public readonly audit: AuditLog;
    public readonly admin: AdminControl;
    public readonly oracles: OracleRegistry;
    public readonly roles: RoleRegistry;
    public readonly ledger: DeliveryLedger;
    public readonly queries: QueryService;

    public constructor(options: LedgerKernelOptions) {
        this.store = options.store ?? new MemoryLedgerStore();
        this.clock = new LogicalClock(this.store, options.genesisHeight);
        this.audit = new AuditLog(this.store, this.clock, { quiet: options.quiet ?? false });
        this.admin = new AdminControl(this.store, this.audit, options.owner);
        this.oracles = new OracleRegistry(this.store, this.admin, this.audit);
        this.roles = new RoleRegistry(this.store, this.admin, this.audit);
        this.ledger = new DeliveryLedger(this.store, this.clock, this.admin, this.roles, this.oracles, this.audit);
        this.queries = new QueryService(this.store, this.admin, this.roles, this.oracles);
    }
}
