import type { EntityID, Hash } from './Primitives.js';
import type { Signature } from './Crypto.js';

/**
 * Environment Port: System Clock
 * Integer seconds, non-decreasing across calls.
 */
export interface ISystemClock {
    now(): number;
}

/**
 * Environment Port: Signature Verifier
 * Resolves false for a signature that does not belong to `signer` or is malformed.
 */
export interface ISignatureVerifier {
    verify(digest: Hash, signature: Signature, signer: EntityID): Promise<boolean>;
}

/**
 * Environment Port: Value Transfer
 * Rejects when the transfer did not happen; the calling operation then aborts.
 */
export interface IValueTransfer {
    transfer(from: EntityID, to: EntityID, amount: bigint): Promise<void>;
}
