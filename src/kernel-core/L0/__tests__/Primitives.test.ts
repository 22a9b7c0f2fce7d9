import { describe, test, expect } from '@jest/globals';
import { RoleSet } from '../Primitives.js';
import { canonicalize, fingerprintOf, hash, toFingerprint } from '../Crypto.js';
import { isTerminal } from '../Ontology.js';

describe('RoleSet', () => {
    test('keeps duplicates and counts each against capacity', () => {
        const roles = RoleSet.of('operator').with('operator').with('admin');
        expect(roles.size).toBe(3);
        expect(roles.toArray()).toEqual(['operator', 'operator', 'admin']);
        expect(roles.isFull).toBe(false);
    });

    test('refuses to grow past five entries', () => {
        const full = RoleSet.of('admin', 'operator', 'supplier', 'recipient', 'oracle');
        expect(full.isFull).toBe(true);
        expect(() => full.with('admin')).toThrow('RoleSet Violation: 6 roles exceed capacity 5');
    });

    test('without drops every occurrence and leaves the original untouched', () => {
        const roles = RoleSet.of('operator', 'admin', 'operator');
        const trimmed = roles.without('operator');
        expect(trimmed.toArray()).toEqual(['admin']);
        expect(roles.toArray()).toEqual(['operator', 'admin', 'operator']);
        expect(RoleSet.empty().without('admin').size).toBe(0);
    });
});

describe('Crypto', () => {
    test('canonicalize sorts object keys at every depth', () => {
        expect(canonicalize({ b: 1, a: [true, null, 'x'] })).toBe('{"a":[true,null,"x"],"b":1}');
        expect(canonicalize({ z: { y: 2, x: 1 } })).toBe('{"z":{"x":1,"y":2}}');
    });

    test('hash is hex sha-256', () => {
        expect(hash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
        expect(fingerprintOf('')).toBe(hash(''));
    });

    test('toFingerprint normalizes hex input to lowercase', () => {
        const lower = 'ab'.repeat(32);
        expect(toFingerprint('AB'.repeat(32))).toBe(lower);
        expect(toFingerprint(`0x${lower}`)).toBe(lower);
    });

    test('toFingerprint accepts 32 raw bytes', () => {
        expect(toFingerprint(new Uint8Array(32).fill(1))).toBe('01'.repeat(32));
    });

    test('toFingerprint rejects the wrong width or non-hex text', () => {
        expect(toFingerprint('ab'.repeat(31))).toBeNull();
        expect(toFingerprint('zz'.repeat(32))).toBeNull();
        expect(toFingerprint(new Uint8Array(33))).toBeNull();
    });
});

describe('Ontology', () => {
    test('terminal statuses are delivered, failed and cancelled', () => {
        expect(isTerminal('delivered')).toBe(true);
        expect(isTerminal('failed')).toBe(true);
        expect(isTerminal('cancelled')).toBe(true);
        expect(isTerminal('arrived')).toBe(false);
    });
});
