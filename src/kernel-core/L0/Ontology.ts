// src/kernel-core/L0/Ontology.ts

// --- 1. Identifiers ---
export type DeliveryID = number; // Caller-supplied, unsigned integer
export type IdentityID = string; // Opaque principal (operator, supplier, recipient, oracle...)
export type LogicalTime = number; // Ledger height, see L0/Clock
export type Fingerprint = string; // 32 bytes, lowercase hex

// --- 2. Delivery Status ---
export const DELIVERY_STATUSES = [
    'pending',
    'assigned',
    'in-transit',
    'delayed',
    'arrived',
    'delivered',
    'failed',
    'cancelled'
] as const;

export type DeliveryStatus = typeof DELIVERY_STATUSES[number];

export const TERMINAL_STATUSES: readonly DeliveryStatus[] = ['delivered', 'failed', 'cancelled'];

export function isDeliveryStatus(value: string): value is DeliveryStatus {
    return DELIVERY_STATUSES.some(status => status === value);
}

export function isTerminal(status: DeliveryStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

// --- 3. Roles ---
export const ROLES = ['operator', 'oracle', 'admin', 'supplier', 'recipient'] as const;

export type Role = typeof ROLES[number];

export function isRole(value: string): value is Role {
    return ROLES.some(role => role === value);
}

// --- 4. Bounds ---
export const LIMITS = {
    eventsPerDelivery: 100,
    rolesPerAssignment: 5,
    oracles: 10,
    fingerprintBytes: 32,
    coordinateLength: 32,
    noteLength: 256,
    reasonLength: 256,
    identityLength: 128
} as const;

// --- 5. Records ---

/**
 * One per delivery. `completed` holds exactly when `status` is terminal, and
 * `sequence` counts the event entries written so far.
 */
export interface DeliveryRecord {
    readonly deliveryId: DeliveryID;
    readonly status: DeliveryStatus;
    readonly operator: IdentityID;
    readonly supplier: IdentityID;
    readonly recipient: IdentityID;
    readonly startTime: LogicalTime;
    readonly expectedArrival: LogicalTime;
    readonly actualArrival: LogicalTime | null;
    readonly payloadFingerprint: Fingerprint;
    readonly sequence: number;
    readonly completed: boolean;
    readonly failureReason: string | null;
}

export interface EventLogEntry {
    readonly deliveryId: DeliveryID;
    readonly sequence: number;
    readonly logicalTime: LogicalTime;
    readonly latitude: string;
    readonly longitude: string;
    readonly altitude: number;
    readonly status: DeliveryStatus;
    readonly updater: IdentityID;
    readonly note: string;
    readonly oracleVerified: boolean;
}

export interface AdminState {
    readonly owner: IdentityID;
    readonly paused: boolean;
}

// --- 6. Operations (audit vocabulary) ---
export const OPERATIONS = [
    'initializeDelivery',
    'logEvent',
    'logFailure',
    'assignRole',
    'removeRole',
    'addOracle',
    'removeOracle',
    'pause',
    'unpause'
] as const;

export type OperationName = typeof OPERATIONS[number];

export function isOperationName(value: string): value is OperationName {
    return OPERATIONS.some(operation => operation === value);
}
