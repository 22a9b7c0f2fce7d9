// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import type { Fingerprint } from './Ontology.js';
import { LIMITS } from './Ontology.js';

export type CanonicalValue =
    | string
    | number
    | boolean
    | null
    | readonly CanonicalValue[]
    | { readonly [key: string]: CanonicalValue };

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON (sorted keys) so equal values always hash equally
export function canonicalize(value: CanonicalValue): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }
    if (isList(value)) {
        return `[${value.map(canonicalize).join(',')}]`;
    }
    const keys = Object.keys(value).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalize(value[k] ?? null)}`).join(',')}}`;
}

function isList(value: readonly CanonicalValue[] | { readonly [key: string]: CanonicalValue }): value is readonly CanonicalValue[] {
    return Array.isArray(value);
}

// 1.3 Payload Fingerprints
const HEX_FINGERPRINT = new RegExp(`^[0-9a-fA-F]{${LIMITS.fingerprintBytes * 2}}$`);

/**
 * Normalizes a payload fingerprint to lowercase hex.
 * Returns null unless the input is exactly 32 bytes (or 64 hex characters).
 */
export function toFingerprint(input: Uint8Array | string): Fingerprint | null {
    if (typeof input === 'string') {
        const trimmed = input.startsWith('0x') ? input.slice(2) : input;
        return HEX_FINGERPRINT.test(trimmed) ? trimmed.toLowerCase() : null;
    }
    if (input.byteLength !== LIMITS.fingerprintBytes) return null;
    return Buffer.from(input).toString('hex');
}

/**
 * Content hash of an arbitrary payload, in fingerprint form.
 */
export function fingerprintOf(content: string | Uint8Array): Fingerprint {
    return createHash('sha256').update(content).digest('hex');
}
