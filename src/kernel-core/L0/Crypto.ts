// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';
import type { EntityID, Hash, Hex } from './Primitives.js';
import { isEntityId, isHash } from './Primitives.js';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): Hash {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical form: sorted keys, bigints as decimal strings, undefined members dropped.
export function canonicalize(value: unknown): string {
    if (value === null || value === undefined) return 'null';

    switch (typeof value) {
        case 'bigint':
            return JSON.stringify(value.toString());
        case 'string':
        case 'boolean':
            return JSON.stringify(value);
        case 'number':
            if (!Number.isFinite(value)) throw new Error(`Canonical form: non-finite number ${value}`);
            return JSON.stringify(value);
        case 'object': {
            if (Array.isArray(value)) {
                return `[${value.map((v: unknown) => canonicalize(v)).join(',')}]`;
            }
            const entries = Object.entries(value)
                .filter(([, v]) => v !== undefined)
                .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
            return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
        }
        default:
            throw new Error(`Canonical form: unsupported type ${typeof value}`);
    }
}

// 1.3 Digital Signatures (Ed25519). Identities are hex public keys.
export type Signature = Hex; // 64 bytes, hex encoded

const SIGNATURE_PATTERN = /^[0-9a-fA-F]{128}$/;

export interface KeyPair {
    publicKey: EntityID;
    privateKey: Hex;
}

export async function generateKeyPair(): Promise<KeyPair> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return {
        publicKey: Buffer.from(publicKey).toString('hex'),
        privateKey: Buffer.from(privateKey).toString('hex'),
    };
}

export async function signDigest(digest: Hash, privateKey: Hex): Promise<Signature> {
    const sig = await ed.sign(digest, privateKey);
    return Buffer.from(sig).toString('hex');
}

/**
 * True iff `signature` is a valid Ed25519 signature of `digest` by `signer`.
 * Malformed input verifies as false.
 */
export async function verifyDigest(digest: Hash, signature: Signature, signer: EntityID): Promise<boolean> {
    if (!isHash(digest) || !SIGNATURE_PATTERN.test(signature) || !isEntityId(signer)) return false;
    try {
        return await ed.verify(signature, digest, signer);
    } catch (e) {
        return false;
    }
}
