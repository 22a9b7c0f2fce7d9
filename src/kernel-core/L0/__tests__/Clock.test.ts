import { describe, test, expect } from '@jest/globals';
import { DEFAULT_GENESIS_HEIGHT, LogicalClock } from '../Clock.js';
import { MemoryLedgerStore } from '../../../infrastructure/persistence/MemoryLedgerStore.js';

describe('LogicalClock', () => {
    test('starts at the genesis height', () => {
        const store = new MemoryLedgerStore();
        const clock = new LogicalClock(store);
        expect(clock.now()).toBe(DEFAULT_GENESIS_HEIGHT);
        expect(store.getClock()).toBe(1000);
    });

    test('advance moves one step and persists', () => {
        const store = new MemoryLedgerStore();
        const clock = new LogicalClock(store, 5);
        expect(clock.advance()).toBe(6);
        expect(clock.now()).toBe(6);
        expect(store.getClock()).toBe(6);
    });

    test('an existing height wins over the configured genesis', () => {
        const store = new MemoryLedgerStore();
        new LogicalClock(store, 10).advance();
        expect(new LogicalClock(store, 500).now()).toBe(11);
    });

    test('rejects a negative genesis height', () => {
        expect(() => new LogicalClock(new MemoryLedgerStore(), -1)).toThrow('Clock Error: Invalid genesis height -1');
    });
});
