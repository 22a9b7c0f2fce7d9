import type { DeliveryID, IdentityID, Role } from '../L0/Ontology.js';
import { RoleSet } from '../L0/Primitives.js';
import {
    CapabilityGuard, CapacityGuard, enforce, ExistenceGuard, IdentityGuard, RoleNameGuard
} from '../L0/Guards.js';
import type { CapabilityCheck } from '../L0/Guards.js';
import { ErrorCode } from '../Errors.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ILedgerStore } from '../Ports.js';
import type { AdminControl } from './AdminControl.js';

export interface RoleGrant {
    user: IdentityID;
    role: Role;
}

/**
 * Per-(user, delivery) capability sets.
 *
 * The ledger owner passes every role check. Role mutations need `admin` on the
 * delivery and, unlike delivery writes, are not blocked by the pause switch.
 */
export class RoleRegistry implements CapabilityCheck {
    constructor(
        private store: ILedgerStore,
        private admin: AdminControl,
        private audit: AuditLog
    ) { }

    public hasRole(user: IdentityID, deliveryId: DeliveryID, role: Role): boolean {
        if (this.admin.isOwner(user)) return true;
        return this.rolesOf(user, deliveryId).has(role);
    }

    public rolesOf(user: IdentityID, deliveryId: DeliveryID): RoleSet {
        const roles = this.store.getRoles(user, deliveryId);
        return roles ? RoleSet.of(...roles) : RoleSet.empty();
    }

    public assignRole(caller: IdentityID, user: IdentityID, deliveryId: DeliveryID, role: Role): void {
        this.audit.execute('assignRole', caller, deliveryId, () => {
            const current = this.rolesOf(user, deliveryId);
            enforce(
                ...this.adminChecks(caller, deliveryId),
                () => IdentityGuard({ field: 'user', value: user }),
                () => RoleNameGuard({ role }),
                () => CapacityGuard({ size: current.size, limit: RoleSet.capacity, code: ErrorCode.ROLE_CAPACITY_EXCEEDED, subject: `Role set of ${user} on delivery ${deliveryId}` })
            );
            this.store.putRoles(user, deliveryId, current.with(role).toArray());
        });
    }

    /**
     * Removing a role the user does not hold succeeds without a write.
     */
    public removeRole(caller: IdentityID, user: IdentityID, deliveryId: DeliveryID, role: Role): void {
        this.audit.execute('removeRole', caller, deliveryId, () => {
            enforce(
                ...this.adminChecks(caller, deliveryId),
                () => RoleNameGuard({ role })
            );
            const current = this.store.getRoles(user, deliveryId);
            if (current && current.includes(role)) {
                this.store.putRoles(user, deliveryId, RoleSet.of(...current).without(role).toArray());
            }
        });
    }

    /**
     * Writes the assignments made at delivery creation, in order. A user named
     * twice keeps only the last grant. Callers run this inside their own
     * transaction.
     */
    public grantInitial(deliveryId: DeliveryID, grants: readonly RoleGrant[]): void {
        for (const { user, role } of grants) {
            this.store.putRoles(user, deliveryId, RoleSet.of(role).toArray());
        }
    }

    private adminChecks(caller: IdentityID, deliveryId: DeliveryID) {
        return [
            () => ExistenceGuard({ deliveryId, record: this.store.getDelivery(deliveryId) }),
            () => CapabilityGuard({ actor: caller, deliveryId, role: 'admin', roles: this })
        ];
    }
}
