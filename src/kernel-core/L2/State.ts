import { createDraft, finishDraft, freeze } from 'immer';
import type { Draft, Immutable } from 'immer';
import type { EntityID, Hash, RecordKey } from '../L0/Primitives.js';
import { toSeconds } from '../L0/Primitives.js';
import type { License, Licensee, LicenseAgreement, LicenseRecord, LedgerEvent, PendingEvent } from '../L0/Ontology.js';
import type { ISystemClock } from '../L0/Ports.js';
import { ErrorCode, LedgerError, isLedgerError } from '../Errors.js';
import { EventJournal } from '../L5/Journal.js';

// --- State ---
export interface LedgerState {
    admins: Record<EntityID, true>;
    licenses: Record<Hash, License>;
    licensees: Record<EntityID, Licensee>;
    agreements: Record<RecordKey, LicenseAgreement>;
    records: Record<RecordKey, LicenseRecord>;
    /** Next application id; never decremented, ids are never reused. */
    applicationCounter: number;
}

export type LedgerView = Immutable<LedgerState>;

export function emptyLedger(): LedgerState {
    return {
        admins: {},
        licenses: {},
        licensees: {},
        agreements: {},
        records: {},
        applicationCounter: 0,
    };
}

/**
 * One operation's exclusive view of the ledger. Time is sampled once, when the
 * transaction starts.
 */
export interface Transaction {
    readonly caller: EntityID;
    readonly now: bigint;
    readonly draft: Draft<LedgerState>;
    emit(event: PendingEvent): void;
    /** Registers an undo step for an external effect; steps run newest first if the transaction fails. */
    onRollback(undo: Compensation): void;
}

export type Compensation = () => Promise<void>;

export type Work<T> = (tx: Transaction) => T | Promise<T>;

/**
 * StateModel: serialized, all-or-nothing transitions over the ledger.
 *
 * Every transaction runs against an immer draft of the committed state. Only when
 * the work resolves are its events journalled and the draft committed; a failure
 * anywhere discards both and undoes the external effects the work registered.
 * Work must return plain values, never draft objects.
 */
export class StateModel {
    private committed: LedgerState;
    private queue: Promise<void> = Promise.resolve();
    private version = 0;

    constructor(
        private readonly clock: ISystemClock,
        private readonly journal: EventJournal,
        genesis: LedgerState = emptyLedger()
    ) {
        this.committed = freeze(structuredClone(genesis), true);
    }

    public get current(): LedgerView { return this.committed; }
    public get Version(): number { return this.version; }

    public transact<T>(caller: EntityID, work: Work<T>): Promise<T> {
        const run = this.queue.then(() => this.execute(caller, work));
        // The queue only waits for completion; outcomes belong to each caller.
        this.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async execute<T>(caller: EntityID, work: Work<T>): Promise<T> {
        const now = BigInt(this.clock.now());
        const draft = createDraft(this.committed);
        const staged: LedgerEvent[] = [];
        const compensations: Compensation[] = [];

        const tx: Transaction = {
            caller,
            now,
            draft,
            emit: (event) => {
                staged.push({ ...event, timestamp: toSeconds(now) });
            },
            onRollback: (undo) => {
                compensations.push(undo);
            }
        };

        let result: T;
        try {
            result = await work(tx);
        } catch (e) {
            if (!isLedgerError(e)) {
                console.error(`[Ledger] Transaction by ${caller} aborted:`, e);
            }
            await this.rollback(caller, compensations);
            throw e;
        }

        // ATOMIC COMMIT
        let next: LedgerState;
        try {
            next = finishDraft(draft);
            await this.journal.append(staged);
        } catch (e) {
            const uncompensated = await this.rollback(caller, compensations);
            const cause = e instanceof Error ? e.message : String(e);
            throw new LedgerError(ErrorCode.TRANSACTION_FAILED, `Commit by ${caller} failed: ${cause}`, {
                cause,
                uncompensated
            });
        }
        this.committed = next;
        this.version++;
        return result;
    }

    /** Runs the undo steps newest first; returns how many of them failed. */
    private async rollback(caller: EntityID, compensations: readonly Compensation[]): Promise<number> {
        let failed = 0;
        for (const undo of [...compensations].reverse()) {
            try {
                await undo();
            } catch (e) {
                failed++;
                console.error(`[Ledger] Rollback step for ${caller} failed:`, e);
            }
        }
        return failed;
    }
}
