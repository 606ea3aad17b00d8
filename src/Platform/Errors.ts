/**
 * Platform: Domain Error Taxonomy
 * Translates ledger failures into the exceptions consumers handle.
 */
import { isLedgerError } from '../kernel-core/Errors.js';
import type { LedgerError } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a state-machine precondition rejects the operation (e.g. already paid).
 */
export class PolicyViolationError extends PlatformError {
    constructor(message: string, reason: string, details?: Record<string, unknown>) {
        super(message, 'POLICY_VIOLATION', { reason, ...details });
    }
}

/**
 * Thrown when the caller lacks the role the operation requires.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, actorId: string, reason?: string) {
        super(message, 'SECURITY_VIOLATION', { actorId, reason });
    }
}

/**
 * Thrown when a referenced license, licensee, application or report is absent.
 */
export class NotFoundError extends PlatformError {
    constructor(message: string, reason: string) {
        super(message, 'NOT_FOUND', { reason });
    }
}

/**
 * Thrown for malformed input and invalid configuration.
 */
export class ValidationError extends PlatformError {
    constructor(message: string, reason: string, issues?: string[]) {
        super(message, 'VALIDATION_FAILED', { reason, issues });
    }
}

/**
 * Thrown when the journal chain does not verify.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, trace?: string) {
        super(message, 'DATA_INTEGRITY_BREACH', { trace });
    }
}

/**
 * Thrown when the environment fails (value transfer, storage).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: unknown) {
        super(message, 'INFRASTRUCTURE_FAILURE', { underlying });
    }
}

function fromLedger(e: LedgerError, actor: string): PlatformError {
    switch (e.category) {
        case 'AUTHORIZATION':
            return new SecurityViolationError(e.message, actor, e.code);
        case 'NOT_FOUND':
            return new NotFoundError(e.message, e.code);
        case 'PRECONDITION':
            return new PolicyViolationError(e.message, e.code, e.metadata);
        case 'VALIDATION':
            return new ValidationError(e.message, e.code);
        case 'INFRASTRUCTURE':
            return new InfrastructureError(e.message, { reason: e.code, ...e.metadata });
    }
}

export function translateError(e: unknown, actor: string): PlatformError {
    if (e instanceof PlatformError) return e;
    if (isLedgerError(e)) return fromLedger(e, actor);
    const message = e instanceof Error ? e.message : String(e);
    return new InfrastructureError(`Unexpected failure: ${message}`, e);
}
