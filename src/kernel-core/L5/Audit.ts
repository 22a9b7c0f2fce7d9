// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { DeliveryID, IdentityID, LogicalTime, OperationName } from '../L0/Ontology.js';
import type { LogicalClock } from '../L0/Clock.js';
import type { ILedgerStore } from '../Ports.js';
import { ErrorCode, LedgerError } from '../Errors.js';

export type EvidenceStatus = 'SUCCESS' | 'REJECT';

// --- Evidence: one entry per mutating call, accepted or rejected ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    operation: OperationName;
    caller: IdentityID;
    deliveryId: DeliveryID | null;
    status: EvidenceStatus;
    code: ErrorCode | null;
    reason: string | null;
    logicalTime: LogicalTime;
}

export type EvidenceInput = Omit<Evidence, 'evidenceId' | 'previousEvidenceId' | 'logicalTime'>;

export interface AuditOptions {
    /** Suppress the console warning emitted for each rejection. */
    quiet?: boolean;
}

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

export class AuditLog {
    constructor(
        private store: ILedgerStore,
        private clock: LogicalClock,
        private options: AuditOptions = {}
    ) { }

    public append(input: EvidenceInput): Evidence {
        const latest = this.store.getLatestEvidence();
        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;
        const logicalTime = this.clock.now();

        const evidence: Evidence = Object.freeze({
            ...input,
            previousEvidenceId: previousHash,
            logicalTime,
            evidenceId: this.calculateHash(previousHash, input, logicalTime)
        });

        this.store.appendEvidence(evidence);
        return evidence;
    }

    /**
     * Runs a mutating operation under audit. Accepted work commits in the same
     * transaction as its SUCCESS evidence; a LedgerError leaves no ledger
     * writes behind, is recorded as REJECT and rethrown.
     */
    public execute<T>(operation: OperationName, caller: IdentityID, deliveryId: DeliveryID | null, work: () => T): T {
        try {
            return this.store.transaction(() => {
                const result = work();
                this.append({ operation, caller, deliveryId, status: 'SUCCESS', code: null, reason: null });
                return result;
            });
        } catch (e) {
            if (e instanceof LedgerError) {
                this.append({ operation, caller, deliveryId, status: 'REJECT', code: e.code, reason: e.detail });
                if (!this.options.quiet) {
                    console.warn(`[Audit] ${operation} rejected for ${caller}: ${e.message}`);
                }
            } else {
                console.error(`[Audit] ${operation} failed unexpectedly for ${caller}:`, e);
            }
            throw e;
        }
    }

    public getHistory(): Evidence[] {
        return this.store.getEvidence();
    }

    public getTip(): Evidence | null {
        return this.store.getLatestEvidence() ?? null;
    }

    // Historical Legitimacy: every link and every hash must recompute
    public verifyChain(): boolean {
        let prev = GENESIS_HASH;

        for (const entry of this.getHistory()) {
            if (entry.previousEvidenceId !== prev) return false;

            const h = this.calculateHash(prev, entry, entry.logicalTime);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    private calculateHash(prevHash: string, input: EvidenceInput, logicalTime: LogicalTime): string {
        // [PreviousHash, Operation, Caller, DeliveryID, Status, Code, ReasonHash, LogicalTime]
        return hash(canonicalize([
            prevHash,
            input.operation,
            input.caller,
            input.deliveryId,
            input.status,
            input.code,
            hash(input.reason ?? ''),
            logicalTime
        ]));
    }
}
