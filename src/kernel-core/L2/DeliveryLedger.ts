import { produce } from 'immer';
import type {
    DeliveryID, DeliveryRecord, EventLogEntry, IdentityID, LogicalTime
} from '../L0/Ontology.js';
import { LIMITS, isTerminal } from '../L0/Ontology.js';
import {
    CapabilityGuard, CompletionGuard, CoordinateGuard, enforce, IdentityGuard, LogLimitGuard, PauseGuard,
    requireExisting, requireFingerprint, requireStatus, TextGuard, UniquenessGuard, UnsignedGuard
} from '../L0/Guards.js';
import type { LogicalClock } from '../L0/Clock.js';
import type { AdminControl } from '../L1/AdminControl.js';
import type { OracleRegistry } from '../L1/OracleRegistry.js';
import type { RoleRegistry } from '../L1/RoleRegistry.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ILedgerStore } from '../Ports.js';

export interface NewDelivery {
    deliveryId: DeliveryID;
    operator: IdentityID;
    supplier: IdentityID;
    recipient: IdentityID;
    expectedArrival: LogicalTime;
    payloadFingerprint: Uint8Array | string;
}

export interface EventUpdate {
    latitude: string;
    longitude: string;
    altitude: number;
    /** Raw text; checked against the status set before anything is written. */
    status: string;
    note: string;
}

/**
 * Delivery records and their append-only event log.
 *
 * Lifecycle: pending → {assigned, in-transit, delayed, arrived}* → {delivered, failed, cancelled}.
 * Any non-terminal status may follow any other; nothing leaves a terminal one.
 */
export class DeliveryLedger {
    constructor(
        private store: ILedgerStore,
        private clock: LogicalClock,
        private admin: AdminControl,
        private roles: RoleRegistry,
        private oracles: OracleRegistry,
        private audit: AuditLog
    ) { }

    public initializeDelivery(caller: IdentityID, delivery: NewDelivery): void {
        const { deliveryId } = delivery;
        this.audit.execute('initializeDelivery', caller, deliveryId, () => {
            enforce(
                () => UnsignedGuard({ field: 'deliveryId', value: deliveryId }),
                () => UniquenessGuard({ deliveryId, record: this.store.getDelivery(deliveryId) }),
                () => PauseGuard({ paused: this.admin.isPaused() }),
                () => IdentityGuard({ field: 'caller', value: caller }),
                () => IdentityGuard({ field: 'operator', value: delivery.operator }),
                () => IdentityGuard({ field: 'supplier', value: delivery.supplier }),
                () => IdentityGuard({ field: 'recipient', value: delivery.recipient }),
                () => UnsignedGuard({ field: 'expectedArrival', value: delivery.expectedArrival })
            );
            const payloadFingerprint = requireFingerprint(delivery.payloadFingerprint);

            const record: DeliveryRecord = {
                deliveryId,
                status: 'pending',
                operator: delivery.operator,
                supplier: delivery.supplier,
                recipient: delivery.recipient,
                startTime: this.clock.now(),
                expectedArrival: delivery.expectedArrival,
                actualArrival: null,
                payloadFingerprint,
                sequence: 0,
                completed: false,
                failureReason: null
            };
            this.store.putDelivery(Object.freeze(record));

            this.roles.grantInitial(deliveryId, [
                { user: caller, role: 'admin' },
                { user: delivery.operator, role: 'operator' },
                { user: delivery.supplier, role: 'supplier' },
                { user: delivery.recipient, role: 'recipient' }
            ]);
        });

        console.log(`[DeliveryLedger] Delivery ${deliveryId} initialized by ${caller}`);
    }

    /**
     * Appends the next entry and moves the delivery to `update.status`.
     * Returns the sequence number of the new entry.
     */
    public logEvent(caller: IdentityID, deliveryId: DeliveryID, update: EventUpdate): number {
        return this.audit.execute('logEvent', caller, deliveryId, () => {
            const record = this.requireOpen(deliveryId);
            const oracleVerified = this.oracles.isOracle(caller);

            enforce(() => CapabilityGuard({ actor: caller, deliveryId, role: 'operator', roles: this.roles, trusted: oracleVerified }));
            const status = requireStatus(update.status);
            enforce(
                () => CoordinateGuard({ latitude: update.latitude, longitude: update.longitude }),
                () => TextGuard({ field: 'latitude', value: update.latitude, max: LIMITS.coordinateLength }),
                () => TextGuard({ field: 'longitude', value: update.longitude, max: LIMITS.coordinateLength }),
                () => TextGuard({ field: 'note', value: update.note, max: LIMITS.noteLength }),
                () => UnsignedGuard({ field: 'altitude', value: update.altitude }),
                () => LogLimitGuard({ record })
            );

            const now = this.clock.now();
            const sequence = record.sequence + 1;

            const entry: EventLogEntry = Object.freeze({
                deliveryId,
                sequence,
                logicalTime: now,
                latitude: update.latitude,
                longitude: update.longitude,
                altitude: update.altitude,
                status,
                updater: caller,
                note: update.note,
                oracleVerified
            });

            const next = produce(record, draft => {
                draft.status = status;
                draft.sequence = sequence;
                if (isTerminal(status)) {
                    draft.completed = true;
                    draft.actualArrival = now;
                }
            });

            this.store.appendEvent(entry);
            this.store.putDelivery(next);
            this.clock.advance();

            return sequence;
        });
    }

    /**
     * Forces a delivery into `failed`. Operator role only: oracles cannot fail
     * a delivery. No event entry is written and the sequence stays put.
     */
    public logFailure(caller: IdentityID, deliveryId: DeliveryID, reason: string): void {
        this.audit.execute('logFailure', caller, deliveryId, () => {
            const record = this.requireOpen(deliveryId);

            enforce(
                () => CapabilityGuard({ actor: caller, deliveryId, role: 'operator', roles: this.roles }),
                () => TextGuard({ field: 'reason', value: reason, max: LIMITS.reasonLength })
            );

            this.store.putDelivery(produce(record, draft => {
                draft.status = 'failed';
                draft.completed = true;
                draft.failureReason = reason;
            }));
        });

        console.log(`[DeliveryLedger] Delivery ${deliveryId} failed by ${caller}: ${reason}`);
    }

    // NOT_FOUND, then PAUSED, then ALREADY_COMPLETED
    private requireOpen(deliveryId: DeliveryID): DeliveryRecord {
        const record = requireExisting(deliveryId, this.store.getDelivery(deliveryId));
        enforce(
            () => PauseGuard({ paused: this.admin.isPaused() }),
            () => CompletionGuard({ record })
        );
        return record;
    }
}
