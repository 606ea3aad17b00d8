import type { EntityID } from '../L0/Primitives.js';
import type { Authority } from '../L0/Guards.js';
import { enforce, AdminGuard, AdminOrOwnerGuard, MainAdminGuard, IdentityGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError } from '../Errors.js';
import { StateModel } from '../L2/State.js';
import type { LedgerView, Transaction } from '../L2/State.js';

/**
 * AccessRegistry: who may act as admin.
 *
 * The main admin is fixed at construction. Additional admins live in ledger state
 * so that grants and revocations commit atomically with everything else.
 */
export class AccessRegistry {
    constructor(
        private readonly state: StateModel,
        public readonly mainAdmin: EntityID
    ) {
        enforce(IdentityGuard({ id: mainAdmin }));
    }

    /** Role predicates against the committed state, or a transaction's draft. */
    public authority(view: Pick<LedgerView, 'admins'> = this.state.current): Authority {
        return {
            isAdmin: (id) => id === this.mainAdmin || view.admins[id] === true,
            isMainAdmin: (id) => id === this.mainAdmin
        };
    }

    public isAdmin(id: EntityID): boolean {
        return this.authority().isAdmin(id);
    }

    public isMainAdmin(id: EntityID): boolean {
        return id === this.mainAdmin;
    }

    public listAdmins(): EntityID[] {
        return [this.mainAdmin, ...Object.keys(this.state.current.admins)];
    }

    // --- Transaction-scoped checks, used by every other component ---

    public requireAdmin(tx: Transaction): void {
        enforce(AdminGuard({ actor: tx.caller, authority: this.authority(tx.draft) }));
    }

    public requireAdminOrOwner(tx: Transaction, owner: EntityID, code?: ErrorCode): void {
        enforce(AdminOrOwnerGuard({ actor: tx.caller, owner, authority: this.authority(tx.draft), code }));
    }

    /** Read-side variant of requireAdminOrOwner. */
    public checkAdminOrOwner(caller: EntityID, owner: EntityID, code?: ErrorCode): void {
        enforce(AdminOrOwnerGuard({ actor: caller, owner, authority: this.authority(), code }));
    }

    // --- Mutations (main admin only) ---

    public addAdmin(caller: EntityID, id: EntityID): Promise<void> {
        return this.state.transact(caller, (tx) => {
            enforce(
                MainAdminGuard({ actor: tx.caller, authority: this.authority(tx.draft) }),
                IdentityGuard({ id })
            );
            if (this.authority(tx.draft).isAdmin(id)) {
                throw new LedgerError(ErrorCode.ALREADY_ADMIN, `${id} is already an admin`);
            }
            tx.draft.admins[id] = true;
            tx.emit({ type: 'AdminAdded', admin: id });
        });
    }

    public removeAdmin(caller: EntityID, id: EntityID): Promise<void> {
        return this.state.transact(caller, (tx) => {
            enforce(
                MainAdminGuard({ actor: tx.caller, authority: this.authority(tx.draft) }),
                IdentityGuard({ id })
            );
            if (tx.draft.admins[id] !== true) {
                throw new LedgerError(ErrorCode.NOT_ADMIN, `${id} is not a removable admin`);
            }
            delete tx.draft.admins[id];
            tx.emit({ type: 'AdminRemoved', admin: id });
        });
    }
}
