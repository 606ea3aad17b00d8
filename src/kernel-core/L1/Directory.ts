import type { EntityID } from '../L0/Primitives.js';
import { toSeconds } from '../L0/Primitives.js';
import type { Licensee } from '../L0/Ontology.js';
import { enforce, IdentityGuard, NonEmptyGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError } from '../Errors.js';
import { StateModel } from '../L2/State.js';
import type { LedgerView, Transaction } from '../L2/State.js';
import { AccessRegistry } from './Access.js';

export interface BatchResult {
    applied: EntityID[];
    skipped: { id: EntityID; code: ErrorCode }[];
}

/**
 * LicenseeDirectory: licensee accounts keyed by identity.
 *
 * Batch updates skip items that cannot be applied instead of aborting the batch.
 */
export class LicenseeDirectory {
    constructor(
        private readonly state: StateModel,
        private readonly access: AccessRegistry
    ) { }

    public isUsableLicensee(id: EntityID, view: Pick<LedgerView, 'licensees'> = this.state.current): boolean {
        return view.licensees[id]?.usable === true;
    }

    public getLicensee(caller: EntityID, id: EntityID): Licensee {
        this.access.checkAdminOrOwner(caller, id, ErrorCode.NOT_OWNER_OR_LICENSEE);
        const licensee = this.state.current.licensees[id];
        if (!licensee) throw new LedgerError(ErrorCode.LICENSEE_DOESNT_EXIST, `Licensee ${id} does not exist`);
        return { ...licensee };
    }

    // --- Self-service ---

    public registerLicensee(caller: EntityID, data: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            enforce(
                IdentityGuard({ id: tx.caller }),
                NonEmptyGuard({ value: data, code: ErrorCode.EMPTY_LICENSEE_DATA, what: 'Licensee data' })
            );
            if (tx.draft.licensees[tx.caller]) {
                throw new LedgerError(ErrorCode.LICENSEE_ALREADY_REGISTERED, `Licensee ${tx.caller} is already registered`);
            }

            tx.draft.licensees[tx.caller] = { id: tx.caller, data, usable: false, registeredAt: toSeconds(tx.now) };
            tx.emit({ type: 'LicenseeRegistered', licensee: tx.caller });
        });
    }

    public updateLicenseeData(caller: EntityID, data: string): Promise<void> {
        return this.state.transact(caller, (tx) => {
            const licensee = tx.draft.licensees[tx.caller];
            if (!licensee) throw new LedgerError(ErrorCode.LICENSEE_DOESNT_EXIST, `Licensee ${tx.caller} does not exist`);
            enforce(NonEmptyGuard({ value: data, code: ErrorCode.EMPTY_LICENSEE_DATA, what: 'Licensee data' }));

            licensee.data = data;
            tx.emit({ type: 'LicenseeUpdated', licensee: tx.caller });
        });
    }

    // --- Admin batches ---

    public approveLicensees(caller: EntityID, ids: readonly EntityID[]): Promise<BatchResult> {
        return this.batch(caller, ids, (tx, id) => {
            const licensee = tx.draft.licensees[id];
            if (!licensee) return ErrorCode.LICENSEE_DOESNT_EXIST;
            if (licensee.usable) return ErrorCode.LICENSEE_ALREADY_USABLE;
            licensee.usable = true;
            tx.emit({ type: 'LicenseeApproved', licensee: id });
            return null;
        });
    }

    public suspendLicensees(caller: EntityID, ids: readonly EntityID[]): Promise<BatchResult> {
        return this.batch(caller, ids, (tx, id) => {
            const licensee = tx.draft.licensees[id];
            if (!licensee) return ErrorCode.LICENSEE_DOESNT_EXIST;
            if (!licensee.usable) return ErrorCode.LICENSEE_NOT_USABLE;
            licensee.usable = false;
            tx.emit({ type: 'LicenseeSuspended', licensee: id });
            return null;
        });
    }

    public removeLicensees(caller: EntityID, ids: readonly EntityID[]): Promise<BatchResult> {
        return this.batch(caller, ids, (tx, id) => {
            if (!tx.draft.licensees[id]) return ErrorCode.LICENSEE_DOESNT_EXIST;
            delete tx.draft.licensees[id];
            tx.emit({ type: 'LicenseeRemoved', licensee: id });
            return null;
        });
    }

    private batch(
        caller: EntityID,
        ids: readonly EntityID[],
        apply: (tx: Transaction, id: EntityID) => ErrorCode | null
    ): Promise<BatchResult> {
        return this.state.transact(caller, (tx) => {
            this.access.requireAdmin(tx);
            const result: BatchResult = { applied: [], skipped: [] };
            for (const id of ids) {
                const skip = apply(tx, id);
                if (skip) {
                    result.skipped.push({ id, code: skip });
                } else {
                    result.applied.push(id);
                }
            }
            return result;
        });
    }
}
