// src/kernel-core/L0/Guards.ts
import { ErrorCode, LedgerError } from '../Errors.js';
import type { PackedLayout } from './Bitfield.js';
import type { EntityID } from './Primitives.js';
import { isEntityId } from './Primitives.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

/**
 * Role predicates resolved against one consistent view of the admin set.
 */
export interface Authority {
    isAdmin(id: EntityID): boolean;
    isMainAdmin(id: EntityID): boolean;
}

/** Throws the first failed guard as a LedgerError. */
export function enforce(...results: GuardResult[]): void {
    for (const result of results) {
        if (!result.ok) throw new LedgerError(result.code, result.violation);
    }
}

// --- Concrete Guards ---

// 1. Roles
export const AdminGuard: Guard<{ actor: EntityID; authority: Authority }> = ({ actor, authority }) => {
    if (!authority.isAdmin(actor)) return FAIL(ErrorCode.UNAUTHORIZED, `${actor} is not an admin`);
    return OK;
};

export const MainAdminGuard: Guard<{ actor: EntityID; authority: Authority }> = ({ actor, authority }) => {
    if (!authority.isMainAdmin(actor)) return FAIL(ErrorCode.NOT_MAIN_ADMIN, `${actor} is not the main admin`);
    return OK;
};

export const AdminOrOwnerGuard: Guard<{ actor: EntityID; owner: EntityID; authority: Authority; code?: ErrorCode }> = ({
    actor,
    owner,
    authority,
    code = ErrorCode.NOT_OWNER_OR_LICENSE_OWNER,
}) => {
    if (actor !== owner && !authority.isAdmin(actor)) {
        return FAIL(code, `${actor} is neither an admin nor the owner ${owner}`);
    }
    return OK;
};

// 2. Input shape
export const IdentityGuard: Guard<{ id: string }> = ({ id }) => {
    if (!isEntityId(id)) return FAIL(ErrorCode.INVALID_IDENTITY, `Invalid identity: ${id || '<empty>'}`);
    return OK;
};

export const NonEmptyGuard: Guard<{ value: string; code: ErrorCode; what: string }> = ({ value, code, what }) => {
    if (value.trim().length === 0) return FAIL(code, `${what} must not be empty`);
    return OK;
};

// 3. Bit-field widths (rejected at write time, never truncated)
export function widthGuard<K extends string>(layout: PackedLayout<K>, code: ErrorCode = ErrorCode.INVALID_FIELD_VALUE): Guard<{ key: K; value: bigint }> {
    return ({ key, value }) => {
        if (!layout.fits(key, value)) {
            return FAIL(code, `${layout.name}.${key} must be within 0..${layout.max(key)}, got ${value}`);
        }
        return OK;
    };
}
