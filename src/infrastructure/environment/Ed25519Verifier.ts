import type { ISignatureVerifier } from '../../kernel-core/L0/Ports.js';
import type { EntityID, Hash } from '../../kernel-core/L0/Primitives.js';
import { verifyDigest } from '../../kernel-core/L0/Crypto.js';
import type { Signature } from '../../kernel-core/L0/Crypto.js';

export class Ed25519Verifier implements ISignatureVerifier {
    verify(digest: Hash, signature: Signature, signer: EntityID): Promise<boolean> {
        return verifyDigest(digest, signature, signer);
    }
}
