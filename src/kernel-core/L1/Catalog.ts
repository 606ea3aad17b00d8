import type { EntityID, Hash } from '../L0/Primitives.js';
import { isHash, toSeconds } from '../L0/Primitives.js';
import { hash } from '../L0/Crypto.js';
import type { License } from '../L0/Ontology.js';
import { enforce, NonEmptyGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError } from '../Errors.js';
import { StateModel } from '../L2/State.js';
import type { LedgerView, Transaction } from '../L2/State.js';
import { AccessRegistry } from './Access.js';

/** License-type hash for a human-readable name, e.g. "Asset Creation". */
export function licenseHashOf(name: string): Hash {
    return hash(name);
}

/**
 * LicenseCatalog: license types keyed by hash, each pointing at its terms.
 */
export class LicenseCatalog {
    constructor(
        private readonly state: StateModel,
        private readonly access: AccessRegistry
    ) { }

    public exists(licenseHash: Hash, view: Pick<LedgerView, 'licenses'> = this.state.current): boolean {
        return view.licenses[licenseHash] !== undefined;
    }

    public getLicense(licenseHash: Hash): License {
        const license = this.state.current.licenses[licenseHash];
        if (!license) throw new LedgerError(ErrorCode.LICENSE_DOESNT_EXIST, `License ${licenseHash} does not exist`);
        return { ...license };
    }

    public listLicenses(): License[] {
        return Object.values(this.state.current.licenses).map((l) => ({ ...l }));
    }

    public addLicense(caller: EntityID, licenseHash: Hash, termsUrl: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            if (!isHash(licenseHash)) {
                throw new LedgerError(ErrorCode.EMPTY_LICENSE_HASH, `License hash must be a 32-byte hex digest`);
            }
            enforce(NonEmptyGuard({ value: termsUrl, code: ErrorCode.EMPTY_URL, what: 'Terms URL' }));
            if (tx.draft.licenses[licenseHash]) {
                throw new LedgerError(ErrorCode.LICENSE_ALREADY_EXISTS, `License ${licenseHash} already exists`);
            }

            tx.draft.licenses[licenseHash] = { licenseHash, termsUrl, addedAt: toSeconds(tx.now) };
            tx.emit({ type: 'LicenseAdded', licenseHash, termsUrl });
        });
    }

    public updateLicenseTerms(caller: EntityID, licenseHash: Hash, termsUrl: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const license = this.requireLicense(tx, licenseHash);
            enforce(NonEmptyGuard({ value: termsUrl, code: ErrorCode.EMPTY_URL, what: 'Terms URL' }));

            license.termsUrl = termsUrl;
            tx.emit({ type: 'LicenseUpdated', licenseHash, termsUrl });
        });
    }

    /** Applications already referencing the license are left as they are. */
    public removeLicense(caller: EntityID, licenseHash: Hash): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            this.requireLicense(tx, licenseHash);

            delete tx.draft.licenses[licenseHash];
            tx.emit({ type: 'LicenseRemoved', licenseHash });
        });
    }

    private requireLicense(tx: Transaction, licenseHash: Hash) {
        const license = tx.draft.licenses[licenseHash];
        if (!license) throw new LedgerError(ErrorCode.LICENSE_DOESNT_EXIST, `License ${licenseHash} does not exist`);
        return license;
    }
}
