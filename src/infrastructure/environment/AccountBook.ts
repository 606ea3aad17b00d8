import type { IValueTransfer } from '../../kernel-core/L0/Ports.js';
import type { EntityID } from '../../kernel-core/L0/Primitives.js';
import { ErrorCode, LedgerError } from '../../kernel-core/Errors.js';

/**
 * In-memory balances behind the value transfer port.
 */
export class AccountBook implements IValueTransfer {
    private balances = new Map<EntityID, bigint>();

    balanceOf(account: EntityID): bigint {
        return this.balances.get(account) ?? 0n;
    }

    deposit(account: EntityID, amount: bigint): void {
        if (amount < 0n) throw new LedgerError(ErrorCode.INVALID_FIELD_VALUE, `Deposit must not be negative, got ${amount}`);
        this.balances.set(account, this.balanceOf(account) + amount);
    }

    async transfer(from: EntityID, to: EntityID, amount: bigint): Promise<void> {
        if (amount < 0n) throw new LedgerError(ErrorCode.INVALID_FIELD_VALUE, `Transfer must not be negative, got ${amount}`);
        const available = this.balanceOf(from);
        if (available < amount) {
            throw new LedgerError(ErrorCode.INSUFFICIENT_FUNDS, `${from} holds ${available}, needs ${amount}`);
        }
        this.balances.set(from, available - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
    }
}
