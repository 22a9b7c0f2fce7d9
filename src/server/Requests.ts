import type { DeliveryID, IdentityID, Role } from '../kernel-core/L0/Ontology.js';
import { isRole } from '../kernel-core/L0/Ontology.js';
import { ErrorCode, LedgerError } from '../kernel-core/Errors.js';

export const CALLER_HEADER = 'x-caller-id';

// Request bodies arrive as parsed JSON of unknown shape; each reader narrows one field.

type Body = Record<string, unknown>;

export function asBody(value: unknown): Body {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw malformed('body', 'Request body must be a JSON object');
    }
    return Object.fromEntries(Object.entries(value));
}

export function readString(body: Body, field: string): string {
    const value = body[field];
    if (typeof value !== 'string') throw malformed(field, `${field} must be a string`);
    return value;
}

export function readUnsigned(body: Body, field: string): number {
    const value = body[field];
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
        throw malformed(field, `${field} must be an unsigned integer`);
    }
    return value;
}

export function readRole(value: string): Role {
    if (!isRole(value)) throw malformed('role', `Unknown role '${value}'`);
    return value;
}

export function parseDeliveryId(raw: string | undefined): DeliveryID {
    return parseUnsignedParam('deliveryId', raw);
}

export function parseUnsignedParam(field: string, raw: string | undefined): number {
    if (raw === undefined || !/^\d+$/.test(raw)) throw malformed(field, `${field} must be an unsigned integer`);
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) throw malformed(field, `${field} is out of range`);
    return value;
}

/**
 * The transport supplies the caller; authentication happens in front of this service.
 */
export function requireCaller(header: string | undefined): IdentityID {
    if (header === undefined || header.length === 0) {
        throw new LedgerError(ErrorCode.UNAUTHORIZED, `Missing ${CALLER_HEADER} header`, { reason: 'missing-caller' });
    }
    return header;
}

function malformed(field: string, message: string): LedgerError {
    return new LedgerError(ErrorCode.MALFORMED_FIELD, message, { field });
}
