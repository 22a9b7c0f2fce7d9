import type {
    AdminState, DeliveryID, DeliveryRecord, EventLogEntry, IdentityID, LogicalTime, Role
} from './L0/Ontology.js';
import type { Evidence } from './L5/Audit.js';

/**
 * Persistence Port: Ledger Store
 * One logical table per concern: deliveries, event log, role assignments,
 * oracle registry, admin state, clock and audit trail.
 *
 * Every call is synchronous. Writes made inside `transaction` are applied
 * together or not at all.
 */
export interface ILedgerStore {
    transaction<T>(work: () => T): T;

    getDelivery(deliveryId: DeliveryID): DeliveryRecord | undefined;
    putDelivery(record: DeliveryRecord): void;

    getEvent(deliveryId: DeliveryID, sequence: number): EventLogEntry | undefined;
    /** Append only: rejects an entry whose (deliveryId, sequence) already exists. */
    appendEvent(entry: EventLogEntry): void;
    listEvents(deliveryId: DeliveryID): EventLogEntry[];

    getRoles(user: IdentityID, deliveryId: DeliveryID): readonly Role[] | undefined;
    putRoles(user: IdentityID, deliveryId: DeliveryID, roles: readonly Role[]): void;

    getOracles(): readonly IdentityID[];
    putOracles(oracles: readonly IdentityID[]): void;

    getAdminState(): AdminState | undefined;
    putAdminState(state: AdminState): void;

    getClock(): LogicalTime | undefined;
    putClock(height: LogicalTime): void;

    appendEvidence(evidence: Evidence): void;
    getEvidence(): Evidence[];
    getLatestEvidence(): Evidence | undefined;
}
