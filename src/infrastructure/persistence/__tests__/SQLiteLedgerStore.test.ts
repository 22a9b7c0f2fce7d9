import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SQLiteLedgerStore } from '../SQLiteLedgerStore.js';
import { LedgerKernel } from '../../../kernel-core/Kernel.js';
import type { EventLogEntry } from '../../../kernel-core/L0/Ontology.js';
import { accounts, createKernel, ErrorCode, expectCode, newDelivery, PAYLOAD_FINGERPRINT, update } from '../../../__tests__/fixtures.js';

const entry: EventLogEntry = {
    deliveryId: 1,
    sequence: 1,
    logicalTime: 1000,
    latitude: '1',
    longitude: '2',
    altitude: 0,
    status: 'assigned',
    updater: 'operator',
    note: '',
    oracleVerified: true
};

describe('SQLiteLedgerStore', () => {
    let store: SQLiteLedgerStore;

    beforeEach(() => {
        store = new SQLiteLedgerStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    test('round-trips an event entry with its flags', () => {
        store.appendEvent(entry);
        expect(store.getEvent(1, 1)).toEqual(entry);
        expect(store.getEvent(1, 2)).toBeUndefined();
    });

    test('refuses to overwrite an event position', () => {
        store.appendEvent(entry);
        expect(() => store.appendEvent({ ...entry, note: 'rewritten' })).toThrow();
        expect(store.getEvent(1, 1)?.note).toBe('');
    });

    test('a throwing transaction leaves no writes', () => {
        expect(() => store.transaction(() => {
            store.appendEvent(entry);
            store.putOracles(['o1']);
            throw new Error('abort');
        })).toThrow('abort');

        expect(store.getEvent(1, 1)).toBeUndefined();
        expect(store.getOracles()).toEqual([]);
    });

    test('keeps oracle order and duplicates', () => {
        store.putOracles(['b', 'a', 'b']);
        expect(store.getOracles()).toEqual(['b', 'a', 'b']);
        store.putOracles(['a']);
        expect(store.getOracles()).toEqual(['a']);
    });

    test('stores role lists per user and delivery', () => {
        store.putRoles('alice', 1, ['admin', 'admin']);
        store.putRoles('alice', 2, ['operator']);
        expect(store.getRoles('alice', 1)).toEqual(['admin', 'admin']);
        expect(store.getRoles('alice', 2)).toEqual(['operator']);
        expect(store.getRoles('bob', 1)).toBeUndefined();
    });

    test('runs the full ledger flow', () => {
        const kernel = createKernel(store);
        kernel.ledger.initializeDelivery(accounts.deployer, newDelivery(1));
        kernel.oracles.addOracle(accounts.deployer, accounts.oracle);
        kernel.ledger.logEvent(accounts.oracle, 1, update('in-transit'));
        expectCode(() => kernel.ledger.logEvent(accounts.unauthorized, 1, update('delivered')), ErrorCode.UNAUTHORIZED);
        kernel.ledger.logEvent(accounts.operator, 1, update('delivered'));

        expect(kernel.queries.getDeliveryDetails(1)).toEqual({
            deliveryId: 1,
            status: 'delivered',
            operator: accounts.operator,
            supplier: accounts.supplier,
            recipient: accounts.recipient,
            startTime: 1000,
            expectedArrival: 2000,
            actualArrival: 1001,
            payloadFingerprint: PAYLOAD_FINGERPRINT,
            sequence: 2,
            completed: true,
            failureReason: null
        });
        expect(kernel.queries.getEventHistory(1).map(e => [e.sequence, e.updater, e.oracleVerified])).toEqual([
            [1, accounts.oracle, true],
            [2, accounts.operator, false]
        ]);
        expect(kernel.audit.getHistory().map(e => e.status)).toEqual(['SUCCESS', 'SUCCESS', 'SUCCESS', 'REJECT', 'SUCCESS']);
        expect(kernel.audit.verifyChain()).toBe(true);
    });
});

describe('SQLiteLedgerStore on disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'delivery-ledger-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    test('state survives a reopen', () => {
        const path = join(dir, 'ledger.db');

        const first = new SQLiteLedgerStore(path);
        const kernel = new LedgerKernel({ owner: accounts.deployer, store: first, quiet: true });
        kernel.ledger.initializeDelivery(accounts.deployer, newDelivery(1));
        kernel.ledger.logEvent(accounts.operator, 1, update('in-transit', 'Left depot'));
        kernel.roles.assignRole(accounts.deployer, accounts.oracle, 1, 'operator');
        kernel.oracles.addOracle(accounts.deployer, accounts.oracle);
        kernel.admin.pause(accounts.deployer);
        const tip = kernel.audit.getTip();
        first.close();

        const second = new SQLiteLedgerStore(path);
        const reopened = new LedgerKernel({ owner: 'someone-else', store: second, quiet: true });

        expect(reopened.queries.getContractOwner()).toBe(accounts.deployer);
        expect(reopened.queries.getContractPaused()).toBe(true);
        expect(reopened.queries.getOracles()).toEqual([accounts.oracle]);
        expect(reopened.queries.getRoles(accounts.oracle, 1)).toEqual(['operator']);
        expect(reopened.queries.getLatestSequence(1)).toBe(1);
        expect(reopened.queries.getEventLog(1, 1)?.note).toBe('Left depot');
        expect(reopened.clock.now()).toBe(1001);
        expect(reopened.audit.getTip()).toEqual(tip);
        expect(reopened.audit.verifyChain()).toBe(true);

        expectCode(() => reopened.ledger.logEvent(accounts.operator, 1, update('delivered')), ErrorCode.PAUSED);
        second.close();
    });
});
