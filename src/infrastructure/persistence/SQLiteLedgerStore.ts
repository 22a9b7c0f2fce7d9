import Database from 'better-sqlite3';
import type {
    AdminState, DeliveryID, DeliveryRecord, EventLogEntry, IdentityID, LogicalTime, Role
} from '../../kernel-core/L0/Ontology.js';
import { isDeliveryStatus, isOperationName, isRole } from '../../kernel-core/L0/Ontology.js';
import type { Evidence, EvidenceStatus } from '../../kernel-core/L5/Audit.js';
import { isErrorCode } from '../../kernel-core/Errors.js';
import type { ErrorCode } from '../../kernel-core/Errors.js';
import type { ILedgerStore } from '../../kernel-core/Ports.js';

interface DeliveryRow {
    delivery_id: number;
    status: string;
    operator: string;
    supplier: string;
    recipient: string;
    start_time: number;
    expected_arrival: number;
    actual_arrival: number | null;
    payload_fingerprint: string;
    sequence: number;
    completed: number;
    failure_reason: string | null;
}

interface EventRow {
    delivery_id: number;
    sequence: number;
    logical_time: number;
    latitude: string;
    longitude: string;
    altitude: number;
    status: string;
    updater: string;
    note: string;
    oracle_verified: number;
}

interface EvidenceRow {
    evidence_id: string;
    previous_evidence_id: string;
    operation: string;
    caller: string;
    delivery_id: number | null;
    status: string;
    code: string | null;
    reason: string | null;
    logical_time: number;
}

export class SQLiteLedgerStore implements ILedgerStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS deliveries (
                delivery_id INTEGER PRIMARY KEY,
                status TEXT NOT NULL,
                operator TEXT NOT NULL,
                supplier TEXT NOT NULL,
                recipient TEXT NOT NULL,
                start_time INTEGER NOT NULL,
                expected_arrival INTEGER NOT NULL,
                actual_arrival INTEGER,
                payload_fingerprint TEXT NOT NULL,
                sequence INTEGER NOT NULL,
                completed INTEGER NOT NULL,
                failure_reason TEXT
            );
            CREATE TABLE IF NOT EXISTS event_log (
                delivery_id INTEGER NOT NULL,
                sequence INTEGER NOT NULL,
                logical_time INTEGER NOT NULL,
                latitude TEXT NOT NULL,
                longitude TEXT NOT NULL,
                altitude INTEGER NOT NULL,
                status TEXT NOT NULL,
                updater TEXT NOT NULL,
                note TEXT NOT NULL,
                oracle_verified INTEGER NOT NULL,
                PRIMARY KEY (delivery_id, sequence)
            );
            CREATE TABLE IF NOT EXISTS role_assignments (
                user_id TEXT NOT NULL,
                delivery_id INTEGER NOT NULL,
                roles TEXT NOT NULL,
                PRIMARY KEY (user_id, delivery_id)
            );
            CREATE TABLE IF NOT EXISTS oracle_registry (
                position INTEGER PRIMARY KEY,
                identity TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS admin_state (
                id INTEGER PRIMARY KEY CHECK (id = 1),
                owner TEXT NOT NULL,
                paused INTEGER NOT NULL
            );
            CREATE TABLE IF NOT EXISTS ledger_clock (
                id INTEGER PRIMARY KEY CHECK (id = 1),
                height INTEGER NOT NULL
            );
            CREATE TABLE IF NOT EXISTS audit_log (
                position INTEGER PRIMARY KEY AUTOINCREMENT,
                evidence_id TEXT UNIQUE NOT NULL,
                previous_evidence_id TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                delivery_id INTEGER,
                status TEXT NOT NULL,
                code TEXT,
                reason TEXT,
                logical_time INTEGER NOT NULL
            );
        `);
    }

    public transaction<T>(work: () => T): T {
        return this.db.transaction(() => work())();
    }

    // --- Deliveries ---

    public getDelivery(deliveryId: DeliveryID): DeliveryRecord | undefined {
        const row = this.db
            .prepare<[number], DeliveryRow>('SELECT * FROM deliveries WHERE delivery_id = ?')
            .get(deliveryId);
        return row ? this.mapRowToDelivery(row) : undefined;
    }

    public putDelivery(record: DeliveryRecord): void {
        this.db.prepare(`
            INSERT INTO deliveries (
                delivery_id, status, operator, supplier, recipient, start_time, expected_arrival,
                actual_arrival, payload_fingerprint, sequence, completed, failure_reason
            ) VALUES (
                @deliveryId, @status, @operator, @supplier, @recipient, @startTime, @expectedArrival,
                @actualArrival, @payloadFingerprint, @sequence, @completed, @failureReason
            )
            ON CONFLICT (delivery_id) DO UPDATE SET
                status = excluded.status,
                actual_arrival = excluded.actual_arrival,
                sequence = excluded.sequence,
                completed = excluded.completed,
                failure_reason = excluded.failure_reason
        `).run({ ...record, completed: record.completed ? 1 : 0 });
    }

    // --- Event Log (append only) ---

    public getEvent(deliveryId: DeliveryID, sequence: number): EventLogEntry | undefined {
        const row = this.db
            .prepare<[number, number], EventRow>('SELECT * FROM event_log WHERE delivery_id = ? AND sequence = ?')
            .get(deliveryId, sequence);
        return row ? this.mapRowToEvent(row) : undefined;
    }

    public appendEvent(entry: EventLogEntry): void {
        // Plain INSERT: the primary key rejects a second write at the same position.
        this.db.prepare(`
            INSERT INTO event_log (
                delivery_id, sequence, logical_time, latitude, longitude, altitude, status, updater, note, oracle_verified
            ) VALUES (
                @deliveryId, @sequence, @logicalTime, @latitude, @longitude, @altitude, @status, @updater, @note, @oracleVerified
            )
        `).run({ ...entry, oracleVerified: entry.oracleVerified ? 1 : 0 });
    }

    public listEvents(deliveryId: DeliveryID): EventLogEntry[] {
        return this.db
            .prepare<[number], EventRow>('SELECT * FROM event_log WHERE delivery_id = ? ORDER BY sequence ASC')
            .all(deliveryId)
            .map(row => this.mapRowToEvent(row));
    }

    // --- Role Assignments ---

    public getRoles(user: IdentityID, deliveryId: DeliveryID): readonly Role[] | undefined {
        const row = this.db
            .prepare<[string, number], { roles: string }>('SELECT roles FROM role_assignments WHERE user_id = ? AND delivery_id = ?')
            .get(user, deliveryId);
        if (!row) return undefined;

        const parsed: unknown = JSON.parse(row.roles);
        if (!Array.isArray(parsed)) throw new Error(`SQLiteLedgerStore Error: Corrupt role set for ${user} on ${deliveryId}`);
        return parsed.map((role: unknown) => {
            if (typeof role !== 'string' || !isRole(role)) {
                throw new Error(`SQLiteLedgerStore Error: Unknown role ${String(role)} for ${user} on ${deliveryId}`);
            }
            return role;
        });
    }

    public putRoles(user: IdentityID, deliveryId: DeliveryID, roles: readonly Role[]): void {
        this.db.prepare(`
            INSERT INTO role_assignments (user_id, delivery_id, roles) VALUES (?, ?, ?)
            ON CONFLICT (user_id, delivery_id) DO UPDATE SET roles = excluded.roles
        `).run(user, deliveryId, JSON.stringify(roles));
    }

    // --- Oracle Registry ---

    public getOracles(): readonly IdentityID[] {
        return this.db
            .prepare<[], { identity: string }>('SELECT identity FROM oracle_registry ORDER BY position ASC')
            .all()
            .map(row => row.identity);
    }

    public putOracles(oracles: readonly IdentityID[]): void {
        this.transaction(() => {
            this.db.prepare('DELETE FROM oracle_registry').run();
            const insert = this.db.prepare('INSERT INTO oracle_registry (position, identity) VALUES (?, ?)');
            oracles.forEach((identity, position) => insert.run(position, identity));
        });
    }

    // --- Admin State & Clock ---

    public getAdminState(): AdminState | undefined {
        const row = this.db
            .prepare<[], { owner: string, paused: number }>('SELECT owner, paused FROM admin_state WHERE id = 1')
            .get();
        return row ? { owner: row.owner, paused: row.paused === 1 } : undefined;
    }

    public putAdminState(state: AdminState): void {
        this.db.prepare(`
            INSERT INTO admin_state (id, owner, paused) VALUES (1, ?, ?)
            ON CONFLICT (id) DO UPDATE SET owner = excluded.owner, paused = excluded.paused
        `).run(state.owner, state.paused ? 1 : 0);
    }

    public getClock(): LogicalTime | undefined {
        const row = this.db
            .prepare<[], { height: number }>('SELECT height FROM ledger_clock WHERE id = 1')
            .get();
        return row?.height;
    }

    public putClock(height: LogicalTime): void {
        this.db.prepare(`
            INSERT INTO ledger_clock (id, height) VALUES (1, ?)
            ON CONFLICT (id) DO UPDATE SET height = excluded.height
        `).run(height);
    }

    // --- Audit Trail ---

    public appendEvidence(evidence: Evidence): void {
        this.db.prepare(`
            INSERT INTO audit_log (
                evidence_id, previous_evidence_id, operation, caller, delivery_id, status, code, reason, logical_time
            ) VALUES (
                @evidenceId, @previousEvidenceId, @operation, @caller, @deliveryId, @status, @code, @reason, @logicalTime
            )
        `).run(evidence);
    }

    public getEvidence(): Evidence[] {
        return this.db
            .prepare<[], EvidenceRow>('SELECT * FROM audit_log ORDER BY position ASC')
            .all()
            .map(row => this.mapRowToEvidence(row));
    }

    public getLatestEvidence(): Evidence | undefined {
        const row = this.db
            .prepare<[], EvidenceRow>('SELECT * FROM audit_log ORDER BY position DESC LIMIT 1')
            .get();
        return row ? this.mapRowToEvidence(row) : undefined;
    }

    public close() {
        this.db.close();
    }

    // --- Row Mapping ---

    private mapRowToDelivery(row: DeliveryRow): DeliveryRecord {
        if (!isDeliveryStatus(row.status)) {
            throw new Error(`SQLiteLedgerStore Error: Unknown status ${row.status} on delivery ${row.delivery_id}`);
        }
        return {
            deliveryId: row.delivery_id,
            status: row.status,
            operator: row.operator,
            supplier: row.supplier,
            recipient: row.recipient,
            startTime: row.start_time,
            expectedArrival: row.expected_arrival,
            actualArrival: row.actual_arrival,
            payloadFingerprint: row.payload_fingerprint,
            sequence: row.sequence,
            completed: row.completed === 1,
            failureReason: row.failure_reason
        };
    }

    private mapRowToEvent(row: EventRow): EventLogEntry {
        if (!isDeliveryStatus(row.status)) {
            throw new Error(`SQLiteLedgerStore Error: Unknown status ${row.status} at ${row.delivery_id}:${row.sequence}`);
        }
        return {
            deliveryId: row.delivery_id,
            sequence: row.sequence,
            logicalTime: row.logical_time,
            latitude: row.latitude,
            longitude: row.longitude,
            altitude: row.altitude,
            status: row.status,
            updater: row.updater,
            note: row.note,
            oracleVerified: row.oracle_verified === 1
        };
    }

    private mapRowToEvidence(row: EvidenceRow): Evidence {
        const { operation, status, code } = row;
        if (!isOperationName(operation)) {
            throw new Error(`SQLiteLedgerStore Error: Unknown operation ${operation} in audit log`);
        }
        return {
            evidenceId: row.evidence_id,
            previousEvidenceId: row.previous_evidence_id,
            operation,
            caller: row.caller,
            deliveryId: row.delivery_id,
            status: this.parseEvidenceStatus(status),
            code: code === null ? null : this.parseErrorCode(code),
            reason: row.reason,
            logicalTime: row.logical_time
        };
    }

    private parseErrorCode(code: string): ErrorCode {
        if (isErrorCode(code)) return code;
        throw new Error(`SQLiteLedgerStore Error: Unknown error code ${code} in audit log`);
    }

    private parseEvidenceStatus(status: string): EvidenceStatus {
        if (status === 'SUCCESS' || status === 'REJECT') return status;
        throw new Error(`SQLiteLedgerStore Error: Unknown evidence status ${status}`);
    }
}
