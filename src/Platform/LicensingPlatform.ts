import { LicensingKernel } from '../kernel-core/Kernel.js';
import type { EntityID, Hash, Hex } from '../kernel-core/L0/Primitives.js';
import type { ApplicationSubmission } from '../kernel-core/L3/Applications.js';
import type { BatchResult } from '../kernel-core/L1/Directory.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { SystemClock } from '../infrastructure/environment/Clock.js';
import { Ed25519Verifier } from '../infrastructure/environment/Ed25519Verifier.js';
import type { LedgerConfig } from './Config.js';
import { DataIntegrityError, translateError } from './Errors.js';
import type { PlatformError } from './Errors.js';
import type { ISignatureVerifier, ISystemClock, IValueTransfer } from './Ports.js';

interface Keyed {
    licensee: EntityID;
    applicationHash: Hash;
}

interface ReportRef extends Keyed {
    index: number;
}

export interface CommandPayloads {
    addAdmin: { admin: EntityID };
    removeAdmin: { admin: EntityID };
    addLicense: { licenseHash: Hash; termsUrl: string };
    updateLicenseTerms: { licenseHash: Hash; termsUrl: string };
    removeLicense: { licenseHash: Hash };
    registerLicensee: { data: string };
    updateLicenseeData: { data: string };
    approveLicensees: { ids: EntityID[] };
    suspendLicensees: { ids: EntityID[] };
    removeLicensees: { ids: EntityID[] };
    submitApplication: ApplicationSubmission;
    payLicenseFee: { applicationHash: Hash };
    approveApplication: Keyed;
    updateLicenseUsable: Keyed;
    addModifications: Keyed & { modifications: Hex };
    updateReportingFrequency: Keyed & { value: bigint };
    updateReportingGracePeriod: Keyed & { value: bigint };
    updateRoyaltyGracePeriod: Keyed & { value: bigint };
    updateExtraData: Keyed & { extraData: bigint };
    incrementUntimelyReports: Keyed;
    incrementUntimelyRoyaltyPayments: Keyed;
    removeApplication: Keyed & { reason: string };
    submitReport: Keyed & { url: string };
    changeReport: ReportRef & { url: string };
    approveReport: ReportRef & { paymentDeadline: bigint; amountDue: bigint };
    payRoyalty: { applicationHash: Hash; index: number; amount: bigint };
    updateReportExtraData: ReportRef & { extraData: bigint };
}

export interface CommandResults {
    addAdmin: void;
    removeAdmin: void;
    addLicense: void;
    updateLicenseTerms: void;
    removeLicense: void;
    registerLicensee: void;
    updateLicenseeData: void;
    approveLicensees: BatchResult;
    suspendLicensees: BatchResult;
    removeLicensees: BatchResult;
    submitApplication: { applicationHash: Hash; id: number };
    payLicenseFee: void;
    approveApplication: void;
    updateLicenseUsable: boolean;
    addModifications: void;
    updateReportingFrequency: void;
    updateReportingGracePeriod: void;
    updateRoyaltyGracePeriod: void;
    updateExtraData: void;
    incrementUntimelyReports: number;
    incrementUntimelyRoyaltyPayments: number;
    removeApplication: void;
    submitReport: number;
    changeReport: void;
    approveReport: void;
    payRoyalty: void;
    updateReportExtraData: void;
}

export type CommandName = keyof CommandPayloads;

/**
 * The Domain Command: one ledger operation on behalf of an authenticated caller.
 */
export type LedgerCommand<K extends CommandName = CommandName> = {
    [P in K]: { op: P; caller: EntityID; payload: CommandPayloads[P] };
}[K];

export type CommandOutcome<T> = { ok: true; result: T } | { ok: false; error: PlatformError };

type Handlers = {
    [P in CommandName]: (caller: EntityID, payload: CommandPayloads[P]) => Promise<CommandResults[P]>;
};

/**
 * LicensingPlatform: the interface layer consumers call.
 * Commands go through execute; reads go to the kernel's components directly.
 */
export class LicensingPlatform {
    private readonly handlers: Handlers;

    constructor(public readonly kernel: LicensingKernel, private readonly store?: SQLiteEventStore) {
        const { access, catalog, directory, applications, royalties } = kernel;
        this.handlers = {
            addAdmin: (c, p) => access.addAdmin(c, p.admin),
            removeAdmin: (c, p) => access.removeAdmin(c, p.admin),
            addLicense: (c, p) => catalog.addLicense(c, p.licenseHash, p.termsUrl),
            updateLicenseTerms: (c, p) => catalog.updateLicenseTerms(c, p.licenseHash, p.termsUrl),
            removeLicense: (c, p) => catalog.removeLicense(c, p.licenseHash),
            registerLicensee: (c, p) => directory.registerLicensee(c, p.data),
            updateLicenseeData: (c, p) => directory.updateLicenseeData(c, p.data),
            approveLicensees: (c, p) => directory.approveLicensees(c, p.ids),
            suspendLicensees: (c, p) => directory.suspendLicensees(c, p.ids),
            removeLicensees: (c, p) => directory.removeLicensees(c, p.ids),
            submitApplication: (c, p) => applications.submitApplication(c, p),
            payLicenseFee: (c, p) => applications.payLicenseFee(c, p.applicationHash),
            approveApplication: (c, p) => applications.approveApplication(c, p.licensee, p.applicationHash),
            updateLicenseUsable: (c, p) => applications.updateLicenseUsable(c, p.licensee, p.applicationHash),
            addModifications: (c, p) => applications.addModifications(c, p.licensee, p.applicationHash, p.modifications),
            updateReportingFrequency: (c, p) => applications.updateReportingFrequency(c, p.licensee, p.applicationHash, p.value),
            updateReportingGracePeriod: (c, p) => applications.updateReportingGracePeriod(c, p.licensee, p.applicationHash, p.value),
            updateRoyaltyGracePeriod: (c, p) => applications.updateRoyaltyGracePeriod(c, p.licensee, p.applicationHash, p.value),
            updateExtraData: (c, p) => applications.updateExtraData(c, p.licensee, p.applicationHash, p.extraData),
            incrementUntimelyReports: (c, p) => applications.incrementUntimelyReports(c, p.licensee, p.applicationHash),
            incrementUntimelyRoyaltyPayments: (c, p) => applications.incrementUntimelyRoyaltyPayments(c, p.licensee, p.applicationHash),
            removeApplication: (c, p) => applications.removeApplication(c, p.licensee, p.applicationHash, p.reason),
            submitReport: (c, p) => royalties.submitReport(c, p.licensee, p.applicationHash, p.url),
            changeReport: (c, p) => royalties.changeReport(c, p.licensee, p.applicationHash, p.index, p.url),
            approveReport: (c, p) =>
                royalties.approveReport(c, p.licensee, p.applicationHash, p.index, p.paymentDeadline, p.amountDue),
            payRoyalty: (c, p) => royalties.payRoyalty(c, p.applicationHash, p.index, p.amount),
            updateReportExtraData: (c, p) =>
                royalties.updateReportExtraData(c, p.licensee, p.applicationHash, p.index, p.extraData),
        };
    }

    /**
     * Standard Execution Entry (Atomic). Failures come back translated, never thrown.
     */
    public async execute<K extends CommandName>(command: LedgerCommand<K>): Promise<CommandOutcome<CommandResults[K]>> {
        try {
            const result = await this.handlers[command.op](command.caller, command.payload);
            return { ok: true, result };
        } catch (e) {
            return { ok: false, error: translateError(e, command.caller) };
        }
    }

    /** Throws DataIntegrityError when the journal chain does not verify. */
    public async verifyJournal(): Promise<void> {
        if (!(await this.kernel.verifyJournal())) {
            throw new DataIntegrityError('Journal chain verification failed', this.store ? 'sqlite' : 'memory');
        }
    }

    public close(): void {
        this.store?.close();
    }
}

export interface PlatformPorts {
    transfer: IValueTransfer;
    clock?: ISystemClock;
    verifier?: ISignatureVerifier;
}

export function createPlatform(config: LedgerConfig, ports: PlatformPorts): LicensingPlatform {
    const store = config.eventDb ? new SQLiteEventStore(config.eventDb) : undefined;
    const kernel = new LicensingKernel({
        mainAdmin: config.mainAdmin,
        feeReceiver: config.feeReceiver,
        overflow: config.overflow,
        clock: ports.clock ?? new SystemClock(),
        verifier: ports.verifier ?? new Ed25519Verifier(),
        transfer: ports.transfer,
        store
    });
    console.log(`[Platform] Ledger started (main admin ${config.mainAdmin}, journal: ${config.eventDb ?? 'memory'})`);
    return new LicensingPlatform(kernel, store);
}
