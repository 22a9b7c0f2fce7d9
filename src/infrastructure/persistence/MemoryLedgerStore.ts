import type {
    AdminState, DeliveryID, DeliveryRecord, EventLogEntry, IdentityID, LogicalTime, Role
} from '../../kernel-core/L0/Ontology.js';
import type { Evidence } from '../../kernel-core/L5/Audit.js';
import type { ILedgerStore } from '../../kernel-core/Ports.js';

interface Tables {
    deliveries: Map<DeliveryID, DeliveryRecord>;
    events: Map<string, EventLogEntry>;
    roles: Map<string, readonly Role[]>;
    oracles: readonly IdentityID[];
    admin: AdminState | undefined;
    clock: LogicalTime | undefined;
    evidence: Evidence[];
}

const eventKey = (deliveryId: DeliveryID, sequence: number) => `${deliveryId}:${sequence}`;
const roleKey = (user: IdentityID, deliveryId: DeliveryID) => JSON.stringify([user, deliveryId]);

/**
 * Process-local store. A transaction takes a shallow snapshot of every table
 * and restores it if the work throws; stored values are never edited in place,
 * so shallow copies are enough.
 */
export class MemoryLedgerStore implements ILedgerStore {
    private tables: Tables = {
        deliveries: new Map(),
        events: new Map(),
        roles: new Map(),
        oracles: [],
        admin: undefined,
        clock: undefined,
        evidence: []
    };
    private depth = 0;

    public transaction<T>(work: () => T): T {
        if (this.depth > 0) return work();

        const snapshot: Tables = {
            ...this.tables,
            deliveries: new Map(this.tables.deliveries),
            events: new Map(this.tables.events),
            roles: new Map(this.tables.roles),
            evidence: [...this.tables.evidence]
        };

        this.depth++;
        try {
            return work();
        } catch (e) {
            this.tables = snapshot;
            throw e;
        } finally {
            this.depth--;
        }
    }

    public getDelivery(deliveryId: DeliveryID): DeliveryRecord | undefined {
        return this.tables.deliveries.get(deliveryId);
    }

    public putDelivery(record: DeliveryRecord): void {
        this.tables.deliveries.set(record.deliveryId, record);
    }

    public getEvent(deliveryId: DeliveryID, sequence: number): EventLogEntry | undefined {
        return this.tables.events.get(eventKey(deliveryId, sequence));
    }

    public appendEvent(entry: EventLogEntry): void {
        const key = eventKey(entry.deliveryId, entry.sequence);
        if (this.tables.events.has(key)) {
            throw new Error(`MemoryLedgerStore Error: Entry ${key} already written`);
        }
        this.tables.events.set(key, entry);
    }

    public listEvents(deliveryId: DeliveryID): EventLogEntry[] {
        const entries: EventLogEntry[] = [];
        for (let sequence = 1; ; sequence++) {
            const entry = this.getEvent(deliveryId, sequence);
            if (!entry) return entries;
            entries.push(entry);
        }
    }

    public getRoles(user: IdentityID, deliveryId: DeliveryID): readonly Role[] | undefined {
        return this.tables.roles.get(roleKey(user, deliveryId));
    }

    public putRoles(user: IdentityID, deliveryId: DeliveryID, roles: readonly Role[]): void {
        this.tables.roles.set(roleKey(user, deliveryId), Object.freeze([...roles]));
    }

    public getOracles(): readonly IdentityID[] {
        return this.tables.oracles;
    }

    public putOracles(oracles: readonly IdentityID[]): void {
        this.tables.oracles = Object.freeze([...oracles]);
    }

    public getAdminState(): AdminState | undefined {
        return this.tables.admin;
    }

    public putAdminState(state: AdminState): void {
        this.tables.admin = Object.freeze({ ...state });
    }

    public getClock(): LogicalTime | undefined {
        return this.tables.clock;
    }

    public putClock(height: LogicalTime): void {
        this.tables.clock = height;
    }

    public appendEvidence(evidence: Evidence): void {
        this.tables.evidence.push(evidence);
    }

    public getEvidence(): Evidence[] {
        return [...this.tables.evidence];
    }

    public getLatestEvidence(): Evidence | undefined {
        return this.tables.evidence[this.tables.evidence.length - 1];
    }
}
