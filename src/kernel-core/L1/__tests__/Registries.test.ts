import { describe, test, expect, beforeEach } from '@jest/globals';
import { LedgerKernel } from '../../Kernel.js';
import { MemoryLedgerStore } from '../../../infrastructure/persistence/MemoryLedgerStore.js';
import { accounts, createKernel, ErrorCode, expectCode, newDelivery } from '../../../__tests__/fixtures.js';

describe('AdminControl', () => {
    let kernel: LedgerKernel;

    beforeEach(() => {
        kernel = createKernel();
    });

    test('the configured owner owns a fresh store, unpaused', () => {
        expect(kernel.admin.owner()).toBe(accounts.deployer);
        expect(kernel.admin.isPaused()).toBe(false);
    });

    test('only the owner toggles the pause switch', () => {
        expectCode(() => kernel.admin.pause(accounts.operator), ErrorCode.UNAUTHORIZED);
        expect(kernel.admin.isPaused()).toBe(false);

        kernel.admin.pause(accounts.deployer);
        expect(kernel.admin.isPaused()).toBe(true);

        expectCode(() => kernel.admin.unpause(accounts.operator), ErrorCode.UNAUTHORIZED);
        kernel.admin.unpause(accounts.deployer);
        expect(kernel.admin.isPaused()).toBe(false);
    });

    test('pausing twice is allowed', () => {
        kernel.admin.pause(accounts.deployer);
        kernel.admin.pause(accounts.deployer);
        expect(kernel.admin.isPaused()).toBe(true);
    });

    test('a store keeps its first owner across kernels', () => {
        const store = new MemoryLedgerStore();
        new LedgerKernel({ owner: 'first-owner', store, quiet: true });
        const reopened = new LedgerKernel({ owner: 'second-owner', store, quiet: true });
        expect(reopened.admin.owner()).toBe('first-owner');
    });

    test('rejects an empty owner', () => {
        expectCode(() => new LedgerKernel({ owner: '', quiet: true }), ErrorCode.MALFORMED_FIELD);
    });
});

describe('OracleRegistry', () => {
    let kernel: LedgerKernel;

    beforeEach(() => {
        kernel = createKernel();
    });

    test('only the owner edits the registry', () => {
        expectCode(() => kernel.oracles.addOracle(accounts.operator, accounts.oracle), ErrorCode.UNAUTHORIZED);
        kernel.oracles.addOracle(accounts.deployer, accounts.oracle);
        expectCode(() => kernel.oracles.removeOracle(accounts.operator, accounts.oracle), ErrorCode.UNAUTHORIZED);
        expect(kernel.oracles.list()).toEqual([accounts.oracle]);
        expect(kernel.oracles.isOracle(accounts.oracle)).toBe(true);
    });

    test('duplicates take a slot each and removal clears all of them', () => {
        kernel.oracles.addOracle(accounts.deployer, 'o1');
        kernel.oracles.addOracle(accounts.deployer, 'o2');
        kernel.oracles.addOracle(accounts.deployer, 'o1');
        expect(kernel.oracles.list()).toEqual(['o1', 'o2', 'o1']);

        kernel.oracles.removeOracle(accounts.deployer, 'o1');
        expect(kernel.oracles.list()).toEqual(['o2']);
        expect(kernel.oracles.isOracle('o1')).toBe(false);
    });

    test('removing an unknown oracle succeeds without change', () => {
        kernel.oracles.addOracle(accounts.deployer, 'o1');
        kernel.oracles.removeOracle(accounts.deployer, 'o9');
        expect(kernel.oracles.list()).toEqual(['o1']);
    });

    test('holds at most ten entries', () => {
        for (let i = 0; i < 10; i++) kernel.oracles.addOracle(accounts.deployer, `oracle-${i}`);
        expectCode(() => kernel.oracles.addOracle(accounts.deployer, 'oracle-10'), ErrorCode.ORACLE_CAPACITY_EXCEEDED);
        expect(kernel.oracles.list()).toHaveLength(10);

        kernel.oracles.removeOracle(accounts.deployer, 'oracle-3');
        kernel.oracles.addOracle(accounts.deployer, 'oracle-10');
        expect(kernel.oracles.list()).toHaveLength(10);
    });

    test('edits are not blocked by the pause switch', () => {
        kernel.admin.pause(accounts.deployer);
        kernel.oracles.addOracle(accounts.deployer, accounts.oracle);
        expect(kernel.oracles.list()).toEqual([accounts.oracle]);
    });
});

describe('RoleRegistry', () => {
    let kernel: LedgerKernel;

    beforeEach(() => {
        kernel = createKernel();
        kernel.ledger.initializeDelivery(accounts.deployer, newDelivery(1));
    });

    test('creation grants admin, operator, supplier and recipient', () => {
        expect(kernel.roles.rolesOf(accounts.deployer, 1).toArray()).toEqual(['admin']);
        expect(kernel.roles.rolesOf(accounts.operator, 1).toArray()).toEqual(['operator']);
        expect(kernel.roles.rolesOf(accounts.supplier, 1).toArray()).toEqual(['supplier']);
        expect(kernel.roles.rolesOf(accounts.recipient, 1).toArray()).toEqual(['recipient']);
    });

    test('a creator named as operator ends up with the operator role only', () => {
        const fresh = createKernel();
        fresh.ledger.initializeDelivery('dispatcher', { ...newDelivery(2), operator: 'dispatcher' });
        expect(fresh.roles.rolesOf('dispatcher', 2).toArray()).toEqual(['operator']);
        expect(fresh.roles.hasRole('dispatcher', 2, 'admin')).toBe(false);
    });

    test('the owner passes every role check, even on unknown deliveries', () => {
        expect(kernel.roles.hasRole(accounts.deployer, 1, 'recipient')).toBe(true);
        expect(kernel.roles.hasRole(accounts.deployer, 99, 'operator')).toBe(true);
        expect(kernel.roles.hasRole(accounts.operator, 99, 'operator')).toBe(false);
    });

    test('roles are scoped to one delivery', () => {
        kernel.ledger.initializeDelivery(accounts.deployer, { ...newDelivery(2), operator: 'other-operator' });
        expect(kernel.roles.hasRole(accounts.operator, 1, 'operator')).toBe(true);
        expect(kernel.roles.hasRole(accounts.operator, 2, 'operator')).toBe(false);
    });

    test('assignment needs admin on the delivery', () => {
        expectCode(() => kernel.roles.assignRole(accounts.operator, accounts.oracle, 1, 'operator'), ErrorCode.UNAUTHORIZED);

        kernel.roles.assignRole(accounts.deployer, 'auditor', 1, 'admin');
        kernel.roles.assignRole('auditor', accounts.oracle, 1, 'operator');
        expect(kernel.roles.hasRole(accounts.oracle, 1, 'operator')).toBe(true);
    });

    test('an unknown delivery is reported before authority', () => {
        expectCode(() => kernel.roles.assignRole(accounts.unauthorized, accounts.oracle, 42, 'operator'), ErrorCode.NOT_FOUND);
        expectCode(() => kernel.roles.removeRole(accounts.deployer, accounts.operator, 42, 'operator'), ErrorCode.NOT_FOUND);
    });

    test('duplicates count toward the five-role capacity', () => {
        for (let i = 0; i < 4; i++) kernel.roles.assignRole(accounts.deployer, accounts.operator, 1, 'operator');
        expect(kernel.roles.rolesOf(accounts.operator, 1).size).toBe(5);
        expectCode(() => kernel.roles.assignRole(accounts.deployer, accounts.operator, 1, 'admin'), ErrorCode.ROLE_CAPACITY_EXCEEDED);

        kernel.roles.removeRole(accounts.deployer, accounts.operator, 1, 'operator');
        expect(kernel.roles.rolesOf(accounts.operator, 1).toArray()).toEqual([]);
        expect(kernel.roles.hasRole(accounts.operator, 1, 'operator')).toBe(false);
    });

    test('removing a role the user lacks changes nothing', () => {
        kernel.roles.removeRole(accounts.deployer, accounts.supplier, 1, 'operator');
        expect(kernel.roles.rolesOf(accounts.supplier, 1).toArray()).toEqual(['supplier']);
    });

    test('role changes go through while paused', () => {
        kernel.admin.pause(accounts.deployer);
        kernel.roles.assignRole(accounts.deployer, accounts.oracle, 1, 'operator');
        kernel.roles.removeRole(accounts.deployer, accounts.supplier, 1, 'supplier');
        expect(kernel.roles.hasRole(accounts.oracle, 1, 'operator')).toBe(true);
        expect(kernel.roles.hasRole(accounts.supplier, 1, 'supplier')).toBe(false);
    });
});
