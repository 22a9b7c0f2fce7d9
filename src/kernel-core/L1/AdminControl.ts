import type { AdminState, IdentityID } from '../L0/Ontology.js';
import { enforce, IdentityGuard, OwnerGuard } from '../L0/Guards.js';
import type { AuditLog } from '../L5/Audit.js';
import type { ILedgerStore } from '../Ports.js';

/**
 * Global owner and pause switch.
 * The owner is fixed the first time a store is initialised; a later boot with
 * a different configured owner keeps the stored one.
 */
export class AdminControl {
    constructor(
        private store: ILedgerStore,
        private audit: AuditLog,
        configuredOwner: IdentityID
    ) {
        enforce(() => IdentityGuard({ field: 'owner', value: configuredOwner }));

        const existing = this.store.getAdminState();
        if (!existing) {
            this.store.putAdminState({ owner: configuredOwner, paused: false });
        } else if (existing.owner !== configuredOwner) {
            console.warn(`[AdminControl] Configured owner ${configuredOwner} ignored; store is owned by ${existing.owner}`);
        }
    }

    private get state(): AdminState {
        const state = this.store.getAdminState();
        if (!state) throw new Error('AdminControl Error: Admin state missing from store');
        return state;
    }

    public owner(): IdentityID {
        return this.state.owner;
    }

    public isOwner(identity: IdentityID): boolean {
        return this.state.owner === identity;
    }

    public isPaused(): boolean {
        return this.state.paused;
    }

    public pause(caller: IdentityID): void {
        this.setPaused('pause', caller, true);
    }

    public unpause(caller: IdentityID): void {
        this.setPaused('unpause', caller, false);
    }

    private setPaused(operation: 'pause' | 'unpause', caller: IdentityID, paused: boolean): void {
        this.audit.execute(operation, caller, null, () => {
            const state = this.state;
            enforce(() => OwnerGuard({ actor: caller, owner: state.owner }));
            this.store.putAdminState({ ...state, paused });
        });
        console.log(`[AdminControl] Ledger ${paused ? 'paused' : 'resumed'} by ${caller}`);
    }
}
