// --- Identifiers ---

/** Hex-encoded Ed25519 public key. */
export type EntityID = string;
/** Hex-encoded SHA-256 digest. */
export type Hash = string;
/** Opaque bytes, hex encoded (may be empty). */
export type Hex = string;

const HEX_64 = /^[0-9a-f]{64}$/;
const HEX = /^(?:[0-9a-f]{2})*$/;

export function isEntityId(value: string): value is EntityID {
    return HEX_64.test(value);
}

export function isHash(value: string): value is Hash {
    return HEX_64.test(value);
}

export function isHex(value: string): value is Hex {
    return HEX.test(value);
}

// --- Keys ---

export type RecordKey = `${EntityID}:${Hash}`;

export function recordKey(licensee: EntityID, applicationHash: Hash): RecordKey {
    return `${licensee}:${applicationHash}`;
}

// --- Time ---

export function toSeconds(now: bigint): number {
    return Number(now);
}

// --- Type helpers ---

export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
