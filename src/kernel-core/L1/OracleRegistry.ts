import type { IdentityID } from '../L0/Ontology.js';
import { LIMITS } from '../L0/Ontology.js';
import { CapacityGuard, enforce, IdentityGuard, OwnerGuard } from '../L0/Guards.js';
import { ErrorCode } from '../Errors.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ILedgerStore } from '../Ports.js';
import type { AdminControl } from './AdminControl.js';

/**
 * Global allowlist of automated updaters. Entries written by a listed identity
 * are marked oracle-verified.
 */
export class OracleRegistry {
    constructor(
        private store: ILedgerStore,
        private admin: AdminControl,
        private audit: AuditLog
    ) { }

    public isOracle(identity: IdentityID): boolean {
        return this.store.getOracles().includes(identity);
    }

    public list(): IdentityID[] {
        return [...this.store.getOracles()];
    }

    /**
     * Appends without a duplicate check; a repeated identity takes another slot.
     */
    public addOracle(caller: IdentityID, identity: IdentityID): void {
        this.audit.execute('addOracle', caller, null, () => {
            const oracles = this.store.getOracles();
            enforce(
                () => OwnerGuard({ actor: caller, owner: this.admin.owner() }),
                () => CapacityGuard({ size: oracles.length, limit: LIMITS.oracles, code: ErrorCode.ORACLE_CAPACITY_EXCEEDED, subject: 'Oracle registry' }),
                () => IdentityGuard({ field: 'oracle', value: identity })
            );
            this.store.putOracles([...oracles, identity]);
        });
    }

    public removeOracle(caller: IdentityID, identity: IdentityID): void {
        this.audit.execute('removeOracle', caller, null, () => {
            enforce(() => OwnerGuard({ actor: caller, owner: this.admin.owner() }));
            const oracles = this.store.getOracles();
            if (oracles.includes(identity)) {
                this.store.putOracles(oracles.filter(o => o !== identity));
            }
        });
    }
}
