import { expect } from '@jest/globals';
import { LedgerKernel } from '../kernel-core/Kernel.js';
import { ErrorCode, LedgerError } from '../kernel-core/Errors.js';
import type { DeliveryID } from '../kernel-core/L0/Ontology.js';
import type { EventUpdate, NewDelivery } from '../kernel-core/L2/DeliveryLedger.js';
import type { ILedgerStore } from '../kernel-core/Ports.js';

export const accounts = {
    deployer: 'deployer',
    operator: 'operator',
    supplier: 'supplier',
    recipient: 'recipient',
    oracle: 'oracle',
    unauthorized: 'unauthorized'
} as const;

export const PAYLOAD_FINGERPRINT = 'ab'.repeat(32);

export function createKernel(store?: ILedgerStore): LedgerKernel {
    return new LedgerKernel({
        owner: accounts.deployer,
        quiet: true,
        ...(store ? { store } : {})
    });
}

export function newDelivery(deliveryId: DeliveryID = 1): NewDelivery {
    return {
        deliveryId,
        operator: accounts.operator,
        supplier: accounts.supplier,
        recipient: accounts.recipient,
        expectedArrival: 2000,
        payloadFingerprint: PAYLOAD_FINGERPRINT
    };
}

export function update(status: string, note: string = ''): EventUpdate {
    return { latitude: '40.7', longitude: '-74.0', altitude: 100, status, note };
}

/**
 * Runs `fn` and asserts it threw a LedgerError with `code`.
 */
export function expectCode(fn: () => unknown, code: ErrorCode): void {
    let caught: unknown = null;
    try {
        fn();
    } catch (e) {
        caught = e;
    }
    expect(caught).toBeInstanceOf(LedgerError);
    expect(caught instanceof LedgerError ? caught.code : null).toBe(code);
}

export { ErrorCode };
