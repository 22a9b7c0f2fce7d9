import type { DeliveryID, DeliveryRecord, EventLogEntry, IdentityID, Role } from '../L0/Ontology.js';
import { requireExisting } from '../L0/Guards.js';
import type { AdminControl } from '../L1/AdminControl.js';
import type { OracleRegistry } from '../L1/OracleRegistry.js';
import type { RoleRegistry } from '../L1/RoleRegistry.js';
import type { ILedgerStore } from '../Ports.js';

/**
 * Read-only projections over the ledger. Nothing here writes.
 *
 * Detail and entry lookups answer `null` for unknown keys; the sequence and
 * completion lookups reject an unknown delivery with NOT_FOUND, since
 * collaborators drive their own state from those answers.
 */
export class QueryService {
    constructor(
        private store: ILedgerStore,
        private admin: AdminControl,
        private roles: RoleRegistry,
        private oracles: OracleRegistry
    ) { }

    public getDeliveryDetails(deliveryId: DeliveryID): DeliveryRecord | null {
        return this.store.getDelivery(deliveryId) ?? null;
    }

    public getEventLog(deliveryId: DeliveryID, sequence: number): EventLogEntry | null {
        return this.store.getEvent(deliveryId, sequence) ?? null;
    }

    /**
     * Entries 1..sequence in order. Empty for an unknown delivery.
     */
    public getEventHistory(deliveryId: DeliveryID): EventLogEntry[] {
        return this.store.listEvents(deliveryId);
    }

    public getLatestSequence(deliveryId: DeliveryID): number {
        return this.requireRecord(deliveryId).sequence;
    }

    public isDeliveryCompleted(deliveryId: DeliveryID): boolean {
        return this.requireRecord(deliveryId).completed;
    }

    public getOracles(): IdentityID[] {
        return this.oracles.list();
    }

    public getContractPaused(): boolean {
        return this.admin.isPaused();
    }

    public getContractOwner(): IdentityID {
        return this.admin.owner();
    }

    public hasRole(user: IdentityID, deliveryId: DeliveryID, role: Role): boolean {
        return this.roles.hasRole(user, deliveryId, role);
    }

    public getRoles(user: IdentityID, deliveryId: DeliveryID): Role[] {
        return this.roles.rolesOf(user, deliveryId).toArray();
    }

    private requireRecord(deliveryId: DeliveryID): DeliveryRecord {
        return requireExisting(deliveryId, this.store.getDelivery(deliveryId));
    }
}
