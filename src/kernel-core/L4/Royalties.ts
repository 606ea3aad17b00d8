import type { EntityID, Hash } from '../L0/Primitives.js';
import { recordKey } from '../L0/Primitives.js';
import type { LicenseRecord } from '../L0/Ontology.js';
import type { IValueTransfer } from '../L0/Ports.js';
import { FIRST_WORD, REPORT_WORD, SECOND_WORD, unpackReport } from '../L0/Bitfield.js';
import type { ReportField, ReportTimes } from '../L0/Bitfield.js';
import { enforce, NonEmptyGuard, widthGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError } from '../Errors.js';
import { StateModel } from '../L2/State.js';
import type { Transaction } from '../L2/State.js';
import { AccessRegistry } from '../L1/Access.js';
import { ApplicationLedger, settle } from '../L3/Applications.js';

export interface ReportView extends ReportTimes {
    index: number;
    url: string;
    amountDue: bigint;
}

const reportWidth = widthGuard(REPORT_WORD);
const reportExtraDataWidth = widthGuard(REPORT_WORD, ErrorCode.INVALID_EXTRA_DATA_LENGTH);

/**
 * RoyaltyLedger: the append-only report log of each application.
 *
 * Submitted -> Approved -> Paid, per report. Late submissions and late payments
 * are accepted and counted against the application.
 */
export class RoyaltyLedger {
    constructor(
        private readonly state: StateModel,
        private readonly access: AccessRegistry,
        private readonly applications: ApplicationLedger,
        private readonly transfer: IValueTransfer
    ) { }

    public submitReport(caller: EntityID, licensee: EntityID, applicationHash: Hash, url: string): Promise<number> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdminOrOwner(tx, licensee);
            const agreement = this.applications.requireAgreement(tx, licensee, applicationHash);
            if (!agreement.usable) {
                throw new LedgerError(ErrorCode.LICENSE_NOT_USABLE, `Application ${applicationHash} is not usable`);
            }
            enforce(NonEmptyGuard({ value: url, code: ErrorCode.EMPTY_URL, what: 'Report URL' }));

            const key = recordKey(licensee, applicationHash);
            const existing = tx.draft.records[key];
            const record: LicenseRecord = existing ?? { licensee, applicationHash, reports: [], currentIndex: -1 };

            const previous = record.reports[record.reports.length - 1];
            const base = previous
                ? REPORT_WORD.unpack(previous.packedWord, 'submissionTimestamp')
                : FIRST_WORD.unpack(agreement.data.firstPackedWord, 'approvalDate');
            const terms = agreement.data.secondPackedWord;
            const frequency = SECOND_WORD.unpack(terms, 'reportingFrequency');
            const grace = SECOND_WORD.unpack(terms, 'reportingGracePeriod');

            // Gate on the frequency alone; lateness also allows for the grace period.
            if (tx.now < base + frequency) {
                throw new LedgerError(
                    ErrorCode.NEW_REPORT_NOT_YET_ALLOWED,
                    `Next report is allowed from ${base + frequency}, now is ${tx.now}`
                );
            }
            const index = record.reports.length;
            if (tx.now > base + frequency + grace) {
                this.applications.recordUntimelyReport(tx, licensee, applicationHash, index);
            }

            record.reports.push({
                amountDue: 0n,
                url,
                packedWord: REPORT_WORD.pack({ submissionTimestamp: tx.now })
            });
            record.currentIndex = index;
            if (!existing) tx.draft.records[key] = record;

            tx.emit({ type: 'ReportSubmitted', licensee, applicationHash, reportIndex: index });
            return index;
        });
    }

    public changeReport(caller: EntityID, licensee: EntityID, applicationHash: Hash, index: number, url: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdminOrOwner(tx, licensee);
            const report = this.requireReport(tx, licensee, applicationHash, index);
            if (REPORT_WORD.unpack(report.packedWord, 'approvalTimestamp') !== 0n) {
                throw new LedgerError(ErrorCode.REPORT_ALREADY_APPROVED, `Report ${index} is already approved`);
            }
            enforce(NonEmptyGuard({ value: url, code: ErrorCode.EMPTY_URL, what: 'Report URL' }));

            report.url = url;
            report.packedWord = REPORT_WORD.set(report.packedWord, 'changeTimestamp', tx.now);
            tx.emit({ type: 'ReportChanged', licensee, applicationHash, reportIndex: index });
        });
    }

    public approveReport(
        caller: EntityID,
        licensee: EntityID,
        applicationHash: Hash,
        index: number,
        paymentDeadline: bigint,
        amountDue: bigint
    ): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const report = this.requireReport(tx, licensee, applicationHash, index);
            if (REPORT_WORD.unpack(report.packedWord, 'approvalTimestamp') !== 0n) {
                throw new LedgerError(ErrorCode.REPORT_ALREADY_APPROVED, `Report ${index} is already approved`);
            }
            enforce(reportWidth({ key: 'paymentDeadline', value: paymentDeadline }));
            if (amountDue < 0n) {
                throw new LedgerError(ErrorCode.INVALID_FIELD_VALUE, `Amount due must not be negative, got ${amountDue}`);
            }

            let word = REPORT_WORD.set(report.packedWord, 'approvalTimestamp', tx.now);
            word = REPORT_WORD.set(word, 'paymentDeadline', paymentDeadline);
            report.packedWord = word;
            report.amountDue = amountDue;
            tx.emit({ type: 'ReportApproved', licensee, applicationHash, reportIndex: index, amountDue, paymentDeadline });
        });
    }

    /** Only the licensee pays, and only the exact amount due. */
    public payRoyalty(caller: EntityID, applicationHash: Hash, index: number, amount: bigint): Promise<void> {
        return this.state.transact(caller, async (tx) => {
            const licensee = tx.caller;
            const agreement = this.applications.requireAgreement(tx, licensee, applicationHash);
            const report = this.requireReport(tx, licensee, applicationHash, index);
            const times = unpackReport(report.packedWord);
            if (times.approvalTimestamp === 0n) {
                throw new LedgerError(ErrorCode.REPORT_NOT_YET_APPROVED, `Report ${index} is not approved yet`);
            }
            if (times.paymentTimestamp !== 0n) {
                throw new LedgerError(ErrorCode.ROYALTY_ALREADY_PAID, `Royalty for report ${index} is already paid`);
            }
            if (amount !== report.amountDue) {
                throw new LedgerError(
                    ErrorCode.ROYALTY_AMOUNT_MISMATCH,
                    `Expected exactly ${report.amountDue}, got ${amount}`,
                    { expected: report.amountDue, received: amount }
                );
            }

            await settle(tx, this.transfer, licensee, this.applications.feeReceiver, amount);

            report.packedWord = REPORT_WORD.set(report.packedWord, 'paymentTimestamp', tx.now);
            tx.emit({ type: 'RoyaltyPaid', licensee, applicationHash, reportIndex: index, amount });

            const grace = SECOND_WORD.unpack(agreement.data.secondPackedWord, 'royaltyGracePeriod');
            if (tx.now > times.paymentDeadline + grace) {
                this.applications.recordUntimelyRoyaltyPayment(tx, licensee, applicationHash, index);
            }
        });
    }

    public updateReportExtraData(
        caller: EntityID,
        licensee: EntityID,
        applicationHash: Hash,
        index: number,
        extraData: bigint
    ): Promise<void> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const report = this.requireReport(tx, licensee, applicationHash, index);
            enforce(reportExtraDataWidth({ key: 'extraData', value: extraData }));

            report.packedWord = REPORT_WORD.set(report.packedWord, 'extraData', extraData);
            tx.emit({ type: 'ReportExtraDataUpdated', licensee, applicationHash, reportIndex: index });
        });
    }

    // --- Reads (admin or owner) ---

    /** Records outlive their application; an untouched key reads as an empty log. */
    public getLicenseRecord(caller: EntityID, licensee: EntityID, applicationHash: Hash): LicenseRecord {
        this.access.checkAdminOrOwner(caller, licensee);
        const record = this.state.current.records[recordKey(licensee, applicationHash)];
        if (!record) return { licensee, applicationHash, reports: [], currentIndex: -1 };
        return {
            licensee: record.licensee,
            applicationHash: record.applicationHash,
            reports: record.reports.map((r) => ({ ...r })),
            currentIndex: record.currentIndex
        };
    }

    public getReportCount(caller: EntityID, licensee: EntityID, applicationHash: Hash): number {
        return this.getLicenseRecord(caller, licensee, applicationHash).reports.length;
    }

    public getReport(caller: EntityID, licensee: EntityID, applicationHash: Hash, index: number): ReportView {
        const record = this.getLicenseRecord(caller, licensee, applicationHash);
        if (record.reports.length === 0) {
            throw new LedgerError(ErrorCode.NO_REPORTS_FOUND, `No reports for ${applicationHash}`);
        }
        const report = record.reports[index];
        if (!report) throw new LedgerError(ErrorCode.REPORT_DOESNT_EXIST, `Report ${index} does not exist`);
        return { index, url: report.url, amountDue: report.amountDue, ...unpackReport(report.packedWord) };
    }

    public getCurrentReport(caller: EntityID, licensee: EntityID, applicationHash: Hash): ReportView {
        const record = this.getLicenseRecord(caller, licensee, applicationHash);
        return this.getReport(caller, licensee, applicationHash, record.currentIndex);
    }

    public getReportField(caller: EntityID, licensee: EntityID, applicationHash: Hash, index: number, field: ReportField): bigint {
        return this.getReport(caller, licensee, applicationHash, index)[field];
    }

    private requireReport(tx: Transaction, licensee: EntityID, applicationHash: Hash, index: number) {
        const record = tx.draft.records[recordKey(licensee, applicationHash)];
        if (!record || record.reports.length === 0) {
            throw new LedgerError(ErrorCode.NO_REPORTS_FOUND, `No reports for ${applicationHash}`);
        }
        const report = Number.isInteger(index) ? record.reports[index] : undefined;
        if (!report) throw new LedgerError(ErrorCode.REPORT_DOESNT_EXIST, `Report ${index} does not exist`);
        return report;
    }
}
