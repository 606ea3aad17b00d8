export { LicensingKernel } from './kernel-core/Kernel.js';
export type { KernelOptions } from './kernel-core/Kernel.js';
export { ErrorCode, LedgerError, isLedgerError } from './kernel-core/Errors.js';
export type { ErrorCategory } from './kernel-core/Errors.js';

export * from './kernel-core/L0/Bitfield.js';
export { hash, canonicalize, generateKeyPair, signDigest, verifyDigest } from './kernel-core/L0/Crypto.js';
export type { KeyPair, Signature } from './kernel-core/L0/Crypto.js';
export type { EntityID, Hash, Hex, RecordKey } from './kernel-core/L0/Primitives.js';
export type * from './kernel-core/L0/Ontology.js';

export { licenseHashOf } from './kernel-core/L1/Catalog.js';
export type { BatchResult } from './kernel-core/L1/Directory.js';
export { applicationHashOf, MAX_LICENSE_FEE } from './kernel-core/L3/Applications.js';
export type { ApplicationSubmission, ApplicationDigestInput, OverflowPolicy } from './kernel-core/L3/Applications.js';
export type { ReportView } from './kernel-core/L4/Royalties.js';
export { EventJournal, GENESIS_ENTRY_ID } from './kernel-core/L5/Journal.js';

export * from './Platform/Errors.js';
export * from './Platform/Ports.js';
export { loadConfig } from './Platform/Config.js';
export type { LedgerConfig } from './Platform/Config.js';
export { LicensingPlatform, createPlatform } from './Platform/LicensingPlatform.js';
export type { LedgerCommand, CommandName, CommandOutcome, CommandPayloads, CommandResults, PlatformPorts } from './Platform/LicensingPlatform.js';

export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { SystemClock, ManualClock } from './infrastructure/environment/Clock.js';
export { AccountBook } from './infrastructure/environment/AccountBook.js';
export { Ed25519Verifier } from './infrastructure/environment/Ed25519Verifier.js';
