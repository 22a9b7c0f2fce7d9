export { LedgerKernel } from './kernel-core/Kernel.js';
export type { LedgerKernelOptions } from './kernel-core/Kernel.js';
export { ErrorCode, LedgerError, isInputError } from './kernel-core/Errors.js';
export type { InputErrorCode } from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export { toFingerprint, fingerprintOf } from './kernel-core/L0/Crypto.js';
export { RoleSet } from './kernel-core/L0/Primitives.js';
export { LogicalClock, DEFAULT_GENESIS_HEIGHT } from './kernel-core/L0/Clock.js';
export { AdminControl } from './kernel-core/L1/AdminControl.js';
export { OracleRegistry } from './kernel-core/L1/OracleRegistry.js';
export { RoleRegistry } from './kernel-core/L1/RoleRegistry.js';
export { DeliveryLedger } from './kernel-core/L2/DeliveryLedger.js';
export type { NewDelivery, EventUpdate } from './kernel-core/L2/DeliveryLedger.js';
export { QueryService } from './kernel-core/L3/QueryService.js';
export { AuditLog } from './kernel-core/L5/Audit.js';
export type { Evidence, EvidenceStatus } from './kernel-core/L5/Audit.js';
export type { ILedgerStore } from './kernel-core/Ports.js';
export { MemoryLedgerStore } from './infrastructure/persistence/MemoryLedgerStore.js';
export { SQLiteLedgerStore } from './infrastructure/persistence/SQLiteLedgerStore.js';
export { LedgerServer, httpStatusFor } from './server/Server.js';
export { loadConfig } from './config.js';
export type { LedgerConfig } from './config.js';
