// src/kernel-core/L0/Guards.ts
import type { DeliveryID, DeliveryRecord, DeliveryStatus, Fingerprint, IdentityID, Role } from './Ontology.js';
import { LIMITS, isDeliveryStatus, isRole } from './Ontology.js';
import { toFingerprint } from './Crypto.js';
import { ErrorCode, LedgerError } from '../Errors.js';
import type { ErrorMetadata } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details: ErrorMetadata };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details: ErrorMetadata = {}): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Evaluates checks in order and throws the first failure.
 * Checks are thunks so a later one can rely on an earlier one having passed.
 */
export function enforce(...checks: Array<() => GuardResult>): void {
    for (const check of checks) {
        const result = check();
        if (!result.ok) {
            throw new LedgerError(result.code, result.violation, result.details);
        }
    }
}

export interface CapabilityCheck {
    hasRole(user: IdentityID, deliveryId: DeliveryID, role: Role): boolean;
}

// --- Concrete Guards ---

// 1. Existence
export const ExistenceGuard: Guard<{ deliveryId: DeliveryID, record: DeliveryRecord | undefined }> = ({ deliveryId, record }) => {
    if (!record) return FAIL(ErrorCode.NOT_FOUND, `Delivery ${deliveryId} does not exist`, { deliveryId });
    return OK;
};

/**
 * Narrowing form of ExistenceGuard.
 */
export function requireExisting(deliveryId: DeliveryID, record: DeliveryRecord | undefined): DeliveryRecord {
    if (record) return record;
    throw new LedgerError(ErrorCode.NOT_FOUND, `Delivery ${deliveryId} does not exist`, { deliveryId });
}

export const UniquenessGuard: Guard<{ deliveryId: DeliveryID, record: DeliveryRecord | undefined }> = ({ deliveryId, record }) => {
    if (record) return FAIL(ErrorCode.ALREADY_INITIALIZED, `Delivery ${deliveryId} already initialized`, { deliveryId });
    return OK;
};

// 2. Pause Gate
export const PauseGuard: Guard<{ paused: boolean }> = ({ paused }) => {
    if (paused) return FAIL(ErrorCode.PAUSED, 'Ledger is paused');
    return OK;
};

// 3. Terminal Lifecycle
export const CompletionGuard: Guard<{ record: DeliveryRecord }> = ({ record }) => {
    if (record.completed) {
        return FAIL(ErrorCode.ALREADY_COMPLETED, `Delivery ${record.deliveryId} is ${record.status}`, { deliveryId: record.deliveryId, status: record.status });
    }
    return OK;
};

// 4. Authority
export const OwnerGuard: Guard<{ actor: IdentityID, owner: IdentityID }> = ({ actor, owner }) => {
    if (actor !== owner) return FAIL(ErrorCode.UNAUTHORIZED, `${actor} is not the ledger owner`, { actor });
    return OK;
};

/**
 * `trusted` lets a caller through without the role (oracle updates).
 */
export const CapabilityGuard: Guard<{
    actor: IdentityID,
    deliveryId: DeliveryID,
    role: Role,
    roles: CapabilityCheck,
    trusted?: boolean
}> = ({ actor, deliveryId, role, roles, trusted }) => {
    if (trusted === true || roles.hasRole(actor, deliveryId, role)) return OK;
    return FAIL(ErrorCode.UNAUTHORIZED, `${actor} lacks ${role} for delivery ${deliveryId}`, { actor, deliveryId, role });
};

// 5. Event Content

/**
 * Narrows raw status text to a DeliveryStatus.
 */
export function requireStatus(status: string): DeliveryStatus {
    if (isDeliveryStatus(status)) return status;
    throw new LedgerError(ErrorCode.INVALID_STATUS, `Unknown status '${status}'`, { status });
}

export const CoordinateGuard: Guard<{ latitude: string, longitude: string }> = ({ latitude, longitude }) => {
    if (latitude.length === 0 || longitude.length === 0) {
        return FAIL(ErrorCode.INVALID_COORDINATES, 'Latitude and longitude must be non-empty');
    }
    return OK;
};

// 6. Capacity
export const LogLimitGuard: Guard<{ record: DeliveryRecord }> = ({ record }) => {
    if (record.sequence >= LIMITS.eventsPerDelivery) {
        return FAIL(ErrorCode.LOG_LIMIT_EXCEEDED, `Delivery ${record.deliveryId} already holds ${LIMITS.eventsPerDelivery} entries`, { deliveryId: record.deliveryId });
    }
    return OK;
};

export const CapacityGuard: Guard<{ size: number, limit: number, code: ErrorCode, subject: string }> = ({ size, limit, code, subject }) => {
    if (size >= limit) return FAIL(code, `${subject} is full (${limit} entries)`, { limit });
    return OK;
};

// 7. Field Shape
export const TextGuard: Guard<{ field: string, value: string, max: number, required?: boolean }> = ({ field, value, max, required }) => {
    if (required === true && value.length === 0) return FAIL(ErrorCode.MALFORMED_FIELD, `${field} must be non-empty`, { field });
    if (value.length > max) return FAIL(ErrorCode.MALFORMED_FIELD, `${field} exceeds ${max} characters`, { field, max });
    return OK;
};

export const IdentityGuard: Guard<{ field: string, value: IdentityID }> = ({ field, value }) =>
    TextGuard({ field, value, max: LIMITS.identityLength, required: true });

export const UnsignedGuard: Guard<{ field: string, value: number }> = ({ field, value }) => {
    if (!Number.isSafeInteger(value) || value < 0) {
        return FAIL(ErrorCode.MALFORMED_FIELD, `${field} must be an unsigned integer`, { field });
    }
    return OK;
};

export const RoleNameGuard: Guard<{ role: string }> = ({ role }) => {
    if (!isRole(role)) return FAIL(ErrorCode.MALFORMED_FIELD, `Unknown role '${role}'`, { field: 'role' });
    return OK;
};

/**
 * Normalizes a payload fingerprint, rejecting anything but 32 bytes.
 */
export function requireFingerprint(input: Uint8Array | string): Fingerprint {
    const fingerprint = toFingerprint(input);
    if (fingerprint !== null) return fingerprint;
    throw new LedgerError(ErrorCode.MALFORMED_FINGERPRINT, `Payload fingerprint must be exactly ${LIMITS.fingerprintBytes} bytes`);
}
