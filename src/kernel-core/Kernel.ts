import type { EntityID } from './L0/Primitives.js';
import type { ISignatureVerifier, ISystemClock, IValueTransfer } from './L0/Ports.js';
import { StateModel } from './L2/State.js';
import type { LedgerState } from './L2/State.js';
import { EventJournal } from './L5/Journal.js';
import type { IEventStore } from './L5/Journal.js';
import { AccessRegistry } from './L1/Access.js';
import { LicenseCatalog } from './L1/Catalog.js';
import { LicenseeDirectory } from './L1/Directory.js';
import { ApplicationLedger } from './L3/Applications.js';
import type { OverflowPolicy } from './L3/Applications.js';
import { RoyaltyLedger } from './L4/Royalties.js';

export interface KernelOptions {
    mainAdmin: EntityID;
    /** Receives license fees and royalties; defaults to the main admin. */
    feeReceiver?: EntityID;
    overflow?: OverflowPolicy;
    clock: ISystemClock;
    verifier: ISignatureVerifier;
    transfer: IValueTransfer;
    store?: IEventStore;
    genesis?: LedgerState;
}

/**
 * LicensingKernel: one ledger, one journal, and the components acting on them.
 *
 * Every component shares the same StateModel, so all operations are serialized
 * through a single queue.
 */
export class LicensingKernel {
    public readonly journal: EventJournal;
    public readonly state: StateModel;
    public readonly access: AccessRegistry;
    public readonly catalog: LicenseCatalog;
    public readonly directory: LicenseeDirectory;
    public readonly applications: ApplicationLedger;
    public readonly royalties: RoyaltyLedger;

    constructor(options: KernelOptions) {
        this.journal = new EventJournal(options.store);
        this.state = new StateModel(options.clock, this.journal, options.genesis);
        this.access = new AccessRegistry(this.state, options.mainAdmin);
        this.catalog = new LicenseCatalog(this.state, this.access);
        this.directory = new LicenseeDirectory(this.state, this.access);
        this.applications = new ApplicationLedger(
            this.state,
            this.access,
            this.catalog,
            this.directory,
            options.verifier,
            options.transfer,
            { feeReceiver: options.feeReceiver ?? options.mainAdmin, overflow: options.overflow }
        );
        this.royalties = new RoyaltyLedger(this.state, this.access, this.applications, options.transfer);
    }

    public get Version(): number { return this.state.Version; }

    public verifyJournal(): Promise<boolean> {
        return this.journal.verifyChain();
    }
}
