import type { EntityID, Hash, Hex, RecordKey } from '../L0/Primitives.js';
import { isHex, recordKey } from '../L0/Primitives.js';
import { hash, canonicalize } from '../L0/Crypto.js';
import type { Signature } from '../L0/Crypto.js';
import type { LicenseAgreement } from '../L0/Ontology.js';
import type { ISignatureVerifier, IValueTransfer } from '../L0/Ports.js';
import { FIRST_WORD, SECOND_WORD, isWord, unpackApplicationTerms } from '../L0/Bitfield.js';
import type { ApplicationField, ApplicationTerms } from '../L0/Bitfield.js';
import { enforce, NonEmptyGuard, widthGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError, isLedgerError } from '../Errors.js';
import { StateModel } from '../L2/State.js';
import type { Transaction } from '../L2/State.js';
import { AccessRegistry } from '../L1/Access.js';
import { LicenseCatalog } from '../L1/Catalog.js';
import { LicenseeDirectory } from '../L1/Directory.js';

/** Upper bound on a license fee, independent of the field width. */
export const MAX_LICENSE_FEE = (1n << 144n) - 1n;

export type OverflowPolicy = 'saturate' | 'wrap';

export interface ApplicationDigestInput {
    licensee: EntityID;
    licenseHash: Hash;
    firstWord: bigint;
    secondWord: bigint;
    modifications: Hex;
    salt: Hex;
}

export interface ApplicationSubmission {
    licenseHash: Hash;
    appliedTermsUrl: string;
    firstWord: bigint;
    secondWord: bigint;
    signature: Signature;
    modifications: Hex;
    salt: Hex;
}

/**
 * The application's key, and the digest its licensee signs.
 */
export function applicationHashOf(input: ApplicationDigestInput): Hash {
    return hash(canonicalize([
        input.licensee,
        input.licenseHash,
        input.firstWord,
        input.secondWord,
        input.modifications,
        input.salt
    ]));
}

/**
 * Moves value through the transfer port. Any failure becomes VALUE_TRANSFER_FAILED,
 * which aborts the surrounding transaction. A completed transfer is paid back if
 * the transaction fails afterwards.
 */
export async function settle(
    tx: Transaction,
    port: IValueTransfer,
    from: EntityID,
    to: EntityID,
    amount: bigint
): Promise<void> {
    try {
        await port.transfer(from, to, amount);
    } catch (e) {
        const cause = isLedgerError(e) ? e.code : e instanceof Error ? e.message : String(e);
        throw new LedgerError(ErrorCode.VALUE_TRANSFER_FAILED, `Transfer of ${amount} from ${from} failed`, { cause });
    }
    tx.onRollback(() => port.transfer(to, from, amount));
}

type UntimelyCounter = 'untimelyReportCount' | 'untimelyRoyaltyPaymentCount';
type TimingField = 'reportingFrequency' | 'reportingGracePeriod' | 'royaltyGracePeriod';

const counterWidth = widthGuard(SECOND_WORD);
const extraDataWidth = widthGuard(SECOND_WORD, ErrorCode.INVALID_EXTRA_DATA_LENGTH);

export interface ApplicationLedgerOptions {
    feeReceiver: EntityID;
    overflow?: OverflowPolicy;
}

/**
 * ApplicationLedger: license agreements keyed by (licensee, applicationHash).
 *
 * NonExistent -> Pending(unpaid) -> Pending(paid) -> Usable <-> Unusable
 */
export class ApplicationLedger {
    public readonly feeReceiver: EntityID;
    public readonly overflow: OverflowPolicy;

    constructor(
        private readonly state: StateModel,
        private readonly access: AccessRegistry,
        private readonly catalog: LicenseCatalog,
        private readonly directory: LicenseeDirectory,
        private readonly verifier: ISignatureVerifier,
        private readonly transfer: IValueTransfer,
        options: ApplicationLedgerOptions
    ) {
        this.feeReceiver = options.feeReceiver;
        this.overflow = options.overflow ?? 'saturate';
    }

    // --- Lifecycle ---

    public submitApplication(caller: EntityID, submission: ApplicationSubmission): Promise<{ applicationHash: Hash; id: number }> {
        return this.state.transact(caller, async (tx) => {
            if (!this.directory.isUsableLicensee(tx.caller, tx.draft)) {
                throw new LedgerError(ErrorCode.LICENSEE_NOT_USABLE, `${tx.caller} is not a usable licensee`);
            }
            if (!this.catalog.exists(submission.licenseHash, tx.draft)) {
                throw new LedgerError(ErrorCode.LICENSE_DOESNT_EXIST, `License ${submission.licenseHash} does not exist`);
            }
            enforce(NonEmptyGuard({ value: submission.appliedTermsUrl, code: ErrorCode.EMPTY_URL, what: 'Applied terms URL' }));

            const { firstWord, secondWord } = submission;
            if (!isWord(firstWord)) {
                throw new LedgerError(ErrorCode.INVALID_LICENSE_FEE, `First packed word is not a 256-bit word`);
            }
            const fee = FIRST_WORD.unpack(firstWord, 'licenseFee');
            if (fee > MAX_LICENSE_FEE) {
                throw new LedgerError(ErrorCode.INVALID_LICENSE_FEE, `License fee ${fee} exceeds ${MAX_LICENSE_FEE}`);
            }
            const expiration = FIRST_WORD.unpack(firstWord, 'expirationDate');
            if (expiration <= tx.now) {
                throw new LedgerError(ErrorCode.INVALID_EXPIRATION_DATE, `Expiration ${expiration} is not after ${tx.now}`);
            }
            if (
                !isWord(secondWord) ||
                FIRST_WORD.unpack(firstWord, 'approvalDate') !== 0n ||
                SECOND_WORD.unpack(secondWord, 'untimelyReportCount') !== 0n ||
                SECOND_WORD.unpack(secondWord, 'untimelyRoyaltyPaymentCount') !== 0n
            ) {
                throw new LedgerError(ErrorCode.INVALID_PACKED_WORD, `A new application carries no approval date or untimely counts`);
            }
            if (!isHex(submission.modifications) || !isHex(submission.salt)) {
                throw new LedgerError(ErrorCode.INVALID_FIELD_VALUE, `Modifications and salt must be hex bytes`);
            }

            const applicationHash = applicationHashOf({
                licensee: tx.caller,
                licenseHash: submission.licenseHash,
                firstWord,
                secondWord,
                modifications: submission.modifications,
                salt: submission.salt
            });
            if (!(await this.verifier.verify(applicationHash, submission.signature, tx.caller))) {
                throw new LedgerError(ErrorCode.INVALID_SIGNATURE, `Signature does not belong to ${tx.caller}`);
            }

            const key = recordKey(tx.caller, applicationHash);
            if (tx.draft.agreements[key]) {
                throw new LedgerError(ErrorCode.APPLICATION_ALREADY_EXISTS, `Application ${applicationHash} already exists`);
            }

            const id = tx.draft.applicationCounter;
            tx.draft.applicationCounter = id + 1;
            tx.draft.agreements[key] = {
                licensee: tx.caller,
                id,
                data: {
                    licenseHash: submission.licenseHash,
                    appliedTermsUrl: submission.appliedTermsUrl,
                    firstPackedWord: FIRST_WORD.set(firstWord, 'submissionDate', tx.now),
                    secondPackedWord: secondWord
                },
                signature: submission.signature,
                usable: false,
                feePaid: false,
                modifications: submission.modifications
            };
            tx.emit({ type: 'ApplicationSubmitted', licensee: tx.caller, applicationHash, id, licenseHash: submission.licenseHash });
            return { applicationHash, id };
        });
    }

    public payLicenseFee(caller: EntityID, applicationHash: Hash): Promise<void> {
        return this.state.transact(caller, async (tx) => {
            const agreement = this.requireAgreement(tx, tx.caller, applicationHash);
            if (agreement.feePaid) {
                throw new LedgerError(ErrorCode.APPLICATION_ALREADY_PAID, `Application ${applicationHash} is already paid`);
            }

            const fee = FIRST_WORD.unpack(agreement.data.firstPackedWord, 'licenseFee');
            await settle(tx, this.transfer, tx.caller, this.feeReceiver, fee);

            agreement.feePaid = true;
            tx.emit({ type: 'LicenseFeePaid', licensee: tx.caller, applicationHash, amount: fee });
        });
    }

    public approveApplication(caller: EntityID, licensee: EntityID, applicationHash: Hash): Promise<void> {
        return this.state.transact(caller, (tx) => {
            const agreement = this.requireAgreement(tx, licensee, applicationHash);
            if (!agreement.feePaid) {
                throw new LedgerError(ErrorCode.APPLICATION_NOT_PAID, `Application ${applicationHash} has not been paid`);
            }
            this.access.requireAdmin(tx);
            if (agreement.usable) {
                throw new LedgerError(ErrorCode.LICENSE_ALREADY_USABLE, `Application ${applicationHash} is already usable`);
            }

            agreement.data.firstPackedWord = FIRST_WORD.set(agreement.data.firstPackedWord, 'approvalDate', tx.now);
            agreement.usable = true;
            tx.emit({ type: 'ApplicationApproved', licensee, applicationHash });
        });
    }

    public updateLicenseUsable(caller: EntityID, licensee: EntityID, applicationHash: Hash): Promise<boolean> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const agreement = this.requireAgreement(tx, licensee, applicationHash);
            const usable = !agreement.usable;
            if (usable && FIRST_WORD.unpack(agreement.data.firstPackedWord, 'approvalDate') === 0n) {
                throw new LedgerError(ErrorCode.APPLICATION_NOT_APPROVED, `Application ${applicationHash} was never approved`);
            }

            agreement.usable = usable;
            tx.emit({ type: 'ApplicationUsabilityChanged', licensee, applicationHash, usable });
            return usable;
        });
    }

    public removeApplication(caller: EntityID, licensee: EntityID, applicationHash: Hash, reason: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdminOrOwner(tx, licensee);
            const key = recordKey(licensee, applicationHash);
            if (!tx.draft.agreements[key]) {
                throw new LedgerError(ErrorCode.APPLICATION_NOT_FOUND, `Application ${applicationHash} not found`);
            }

            // The royalty record under the same key stays.
            delete tx.draft.agreements[key];
            tx.emit({ type: 'ApplicationRemoved', licensee, applicationHash, reason });
        });
    }

    // --- Admin field setters ---

    public addModifications(caller: EntityID, licensee: EntityID, applicationHash: Hash, modifications: Hex): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const agreement = this.requireAgreement(tx, licensee, applicationHash);
            if (!isHex(modifications)) {
                throw new LedgerError(ErrorCode.INVALID_FIELD_VALUE, `Modifications must be hex bytes`);
            }

            agreement.modifications = modifications;
            tx.emit({ type: 'ModificationsAdded', licensee, applicationHash, modifications });
        });
    }

    public updateReportingFrequency(caller: EntityID, licensee: EntityID, applicationHash: Hash, value: bigint): Promise<void> {
        return this.updateTiming(caller, licensee, applicationHash, 'reportingFrequency', value);
    }

    public updateReportingGracePeriod(caller: EntityID, licensee: EntityID, applicationHash: Hash, value: bigint): Promise<void> {
        return this.updateTiming(caller, licensee, applicationHash, 'reportingGracePeriod', value);
    }

    public updateRoyaltyGracePeriod(caller: EntityID, licensee: EntityID, applicationHash: Hash, value: bigint): Promise<void> {
        return this.updateTiming(caller, licensee, applicationHash, 'royaltyGracePeriod', value);
    }

    public updateExtraData(caller: EntityID, licensee: EntityID, applicationHash: Hash, extraData: bigint): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const agreement = this.requireAgreement(tx, licensee, applicationHash);
            enforce(extraDataWidth({ key: 'extraData', value: extraData }));

            agreement.data.secondPackedWord = SECOND_WORD.set(agreement.data.secondPackedWord, 'extraData', extraData);
            tx.emit({ type: 'ApplicationTermsUpdated', licensee, applicationHash, field: 'extraData', value: extraData });
        });
    }

    public incrementUntimelyReports(caller: EntityID, licensee: EntityID, applicationHash: Hash): Promise<number> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            return this.recordUntimelyReport(tx, licensee, applicationHash);
        });
    }

    public incrementUntimelyRoyaltyPayments(caller: EntityID, licensee: EntityID, applicationHash: Hash): Promise<number> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            return this.recordUntimelyRoyaltyPayment(tx, licensee, applicationHash);
        });
    }

    // --- Transaction-scoped helpers, shared with the royalty ledger ---

    public requireAgreement(tx: Transaction, licensee: EntityID, applicationHash: Hash) {
        const agreement = tx.draft.agreements[recordKey(licensee, applicationHash)];
        if (!agreement) throw new LedgerError(ErrorCode.APPLICATION_NOT_FOUND, `Application ${applicationHash} not found`);
        return agreement;
    }

    public recordUntimelyReport(tx: Transaction, licensee: EntityID, applicationHash: Hash, reportIndex?: number): number {
        const count = this.bump(tx, licensee, applicationHash, 'untimelyReportCount');
        tx.emit({ type: 'UntimelyReport', licensee, applicationHash, reportIndex, count });
        return count;
    }

    public recordUntimelyRoyaltyPayment(tx: Transaction, licensee: EntityID, applicationHash: Hash, reportIndex?: number): number {
        const count = this.bump(tx, licensee, applicationHash, 'untimelyRoyaltyPaymentCount');
        tx.emit({ type: 'UntimelyRoyaltyPayment', licensee, applicationHash, reportIndex, count });
        return count;
    }

    // --- Reads (admin or owner, then existence) ---

    public getLicenseAgreement(caller: EntityID, licensee: EntityID, applicationHash: Hash): LicenseAgreement {
        const agreement = this.view(caller, licensee, applicationHash);
        return { ...agreement, data: { ...agreement.data } };
    }

    public getApplicationTerms(caller: EntityID, licensee: EntityID, applicationHash: Hash): ApplicationTerms {
        const { data } = this.view(caller, licensee, applicationHash);
        return unpackApplicationTerms(data.firstPackedWord, data.secondPackedWord);
    }

    public getApplicationField(caller: EntityID, licensee: EntityID, applicationHash: Hash, field: ApplicationField): bigint {
        const { data } = this.view(caller, licensee, applicationHash);
        if (FIRST_WORD.has(field)) return FIRST_WORD.unpack(data.firstPackedWord, field);
        return SECOND_WORD.unpack(data.secondPackedWord, field);
    }

    public getLicenseFee(caller: EntityID, licensee: EntityID, applicationHash: Hash): bigint {
        return this.getApplicationField(caller, licensee, applicationHash, 'licenseFee');
    }

    public isLicenseUsable(caller: EntityID, licensee: EntityID, applicationHash: Hash): boolean {
        return this.view(caller, licensee, applicationHash).usable;
    }

    public isFeePaid(caller: EntityID, licensee: EntityID, applicationHash: Hash): boolean {
        return this.view(caller, licensee, applicationHash).feePaid;
    }

    public getModifications(caller: EntityID, licensee: EntityID, applicationHash: Hash): Hex {
        return this.view(caller, licensee, applicationHash).modifications;
    }

    /** Application hashes held by a licensee, in submission order. */
    public listApplications(caller: EntityID, licensee: EntityID): Hash[] {
        this.access.checkAdminOrOwner(caller, licensee);
        const prefix = `${licensee}:`;
        return Object.entries(this.state.current.agreements)
            .filter(([key]) => key.startsWith(prefix))
            .sort(([, a], [, b]) => a.id - b.id)
            .map(([key]) => key.slice(prefix.length));
    }

    // --- Internals ---

    private updateTiming(caller: EntityID, licensee: EntityID, applicationHash: Hash, field: TimingField, value: bigint): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const agreement = this.requireAgreement(tx, licensee, applicationHash);
            enforce(counterWidth({ key: field, value }));

            agreement.data.secondPackedWord = SECOND_WORD.set(agreement.data.secondPackedWord, field, value);
            tx.emit({ type: 'ApplicationTermsUpdated', licensee, applicationHash, field, value });
        });
    }

    private bump(tx: Transaction, licensee: EntityID, applicationHash: Hash, counter: UntimelyCounter): number {
        const agreement = this.requireAgreement(tx, licensee, applicationHash);
        const current = SECOND_WORD.unpack(agreement.data.secondPackedWord, counter);
        let next = current + 1n;
        if (next > SECOND_WORD.max(counter)) {
            if (this.overflow === 'wrap') {
                next = 0n;
            } else {
                console.warn(`[Ledger] ${counter} of ${licensee}:${applicationHash} is saturated at ${current}`);
                next = current;
            }
        }
        agreement.data.secondPackedWord = SECOND_WORD.set(agreement.data.secondPackedWord, counter, next);
        return Number(next);
    }

    private view(caller: EntityID, licensee: EntityID, applicationHash: Hash) {
        this.access.checkAdminOrOwner(caller, licensee);
        const key: RecordKey = recordKey(licensee, applicationHash);
        const agreement = this.state.current.agreements[key];
        if (!agreement) throw new LedgerError(ErrorCode.APPLICATION_NOT_FOUND, `Application ${applicationHash} not found`);
        return agreement;
    }
}
