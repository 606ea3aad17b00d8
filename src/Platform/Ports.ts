/**
 * Ports the platform is wired with. The kernel owns the definitions; consumers
 * import them from here.
 */
export type { ISystemClock, ISignatureVerifier, IValueTransfer } from '../kernel-core/L0/Ports.js';
export type { IEventStore, JournalEntry } from '../kernel-core/L5/Journal.js';
