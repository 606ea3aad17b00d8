/**
 * Ledger Error Taxonomy
 * Centralized error codes for rejected transitions. Every rejection aborts the
 * whole operation with no observable state change.
 */

export type ErrorCategory = 'AUTHORIZATION' | 'NOT_FOUND' | 'PRECONDITION' | 'VALIDATION' | 'INFRASTRUCTURE';

export enum ErrorCode {
    // I. Authorization
    UNAUTHORIZED = 'UNAUTHORIZED',
    NOT_MAIN_ADMIN = 'NOT_MAIN_ADMIN',
    NOT_OWNER_OR_LICENSE_OWNER = 'NOT_OWNER_OR_LICENSE_OWNER',
    NOT_OWNER_OR_LICENSEE = 'NOT_OWNER_OR_LICENSEE',
    LICENSEE_NOT_USABLE = 'LICENSEE_NOT_USABLE',

    // II. Not found
    APPLICATION_NOT_FOUND = 'APPLICATION_NOT_FOUND',
    LICENSE_DOESNT_EXIST = 'LICENSE_DOESNT_EXIST',
    LICENSEE_DOESNT_EXIST = 'LICENSEE_DOESNT_EXIST',
    NO_REPORTS_FOUND = 'NO_REPORTS_FOUND',
    REPORT_DOESNT_EXIST = 'REPORT_DOESNT_EXIST',
    NOT_ADMIN = 'NOT_ADMIN',

    // III. State-machine preconditions
    APPLICATION_NOT_PAID = 'APPLICATION_NOT_PAID',
    APPLICATION_ALREADY_PAID = 'APPLICATION_ALREADY_PAID',
    APPLICATION_NOT_APPROVED = 'APPLICATION_NOT_APPROVED',
    APPLICATION_ALREADY_EXISTS = 'APPLICATION_ALREADY_EXISTS',
    LICENSE_ALREADY_USABLE = 'LICENSE_ALREADY_USABLE',
    LICENSE_NOT_USABLE = 'LICENSE_NOT_USABLE',
    LICENSE_ALREADY_EXISTS = 'LICENSE_ALREADY_EXISTS',
    LICENSEE_ALREADY_REGISTERED = 'LICENSEE_ALREADY_REGISTERED',
    LICENSEE_ALREADY_USABLE = 'LICENSEE_ALREADY_USABLE',
    ALREADY_ADMIN = 'ALREADY_ADMIN',
    REPORT_ALREADY_APPROVED = 'REPORT_ALREADY_APPROVED',
    REPORT_NOT_YET_APPROVED = 'REPORT_NOT_YET_APPROVED',
    ROYALTY_ALREADY_PAID = 'ROYALTY_ALREADY_PAID',
    NEW_REPORT_NOT_YET_ALLOWED = 'NEW_REPORT_NOT_YET_ALLOWED',

    // IV. Validation
    INVALID_IDENTITY = 'INVALID_IDENTITY',
    INVALID_SIGNATURE = 'INVALID_SIGNATURE',
    INVALID_LICENSE_FEE = 'INVALID_LICENSE_FEE',
    INVALID_EXPIRATION_DATE = 'INVALID_EXPIRATION_DATE',
    INVALID_EXTRA_DATA_LENGTH = 'INVALID_EXTRA_DATA_LENGTH',
    INVALID_PACKED_WORD = 'INVALID_PACKED_WORD',
    INVALID_FIELD_VALUE = 'INVALID_FIELD_VALUE',
    ROYALTY_AMOUNT_MISMATCH = 'ROYALTY_AMOUNT_MISMATCH',
    EMPTY_LICENSEE_DATA = 'EMPTY_LICENSEE_DATA',
    EMPTY_LICENSE_HASH = 'EMPTY_LICENSE_HASH',
    EMPTY_URL = 'EMPTY_URL',

    // V. Environment
    VALUE_TRANSFER_FAILED = 'VALUE_TRANSFER_FAILED',
    INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
    TRANSACTION_FAILED = 'TRANSACTION_FAILED',
}

const CATEGORY: Record<ErrorCode, ErrorCategory> = {
    [ErrorCode.UNAUTHORIZED]: 'AUTHORIZATION',
    [ErrorCode.NOT_MAIN_ADMIN]: 'AUTHORIZATION',
    [ErrorCode.NOT_OWNER_OR_LICENSE_OWNER]: 'AUTHORIZATION',
    [ErrorCode.NOT_OWNER_OR_LICENSEE]: 'AUTHORIZATION',
    [ErrorCode.LICENSEE_NOT_USABLE]: 'AUTHORIZATION',

    [ErrorCode.APPLICATION_NOT_FOUND]: 'NOT_FOUND',
    [ErrorCode.LICENSE_DOESNT_EXIST]: 'NOT_FOUND',
    [ErrorCode.LICENSEE_DOESNT_EXIST]: 'NOT_FOUND',
    [ErrorCode.NO_REPORTS_FOUND]: 'NOT_FOUND',
    [ErrorCode.REPORT_DOESNT_EXIST]: 'NOT_FOUND',
    [ErrorCode.NOT_ADMIN]: 'NOT_FOUND',

    [ErrorCode.APPLICATION_NOT_PAID]: 'PRECONDITION',
    [ErrorCode.APPLICATION_ALREADY_PAID]: 'PRECONDITION',
    [ErrorCode.APPLICATION_NOT_APPROVED]: 'PRECONDITION',
    [ErrorCode.APPLICATION_ALREADY_EXISTS]: 'PRECONDITION',
    [ErrorCode.LICENSE_ALREADY_USABLE]: 'PRECONDITION',
    [ErrorCode.LICENSE_NOT_USABLE]: 'PRECONDITION',
    [ErrorCode.LICENSE_ALREADY_EXISTS]: 'PRECONDITION',
    [ErrorCode.LICENSEE_ALREADY_REGISTERED]: 'PRECONDITION',
    [ErrorCode.LICENSEE_ALREADY_USABLE]: 'PRECONDITION',
    [ErrorCode.ALREADY_ADMIN]: 'PRECONDITION',
    [ErrorCode.REPORT_ALREADY_APPROVED]: 'PRECONDITION',
    [ErrorCode.REPORT_NOT_YET_APPROVED]: 'PRECONDITION',
    [ErrorCode.ROYALTY_ALREADY_PAID]: 'PRECONDITION',
    [ErrorCode.NEW_REPORT_NOT_YET_ALLOWED]: 'PRECONDITION',

    [ErrorCode.INVALID_IDENTITY]: 'VALIDATION',
    [ErrorCode.INVALID_SIGNATURE]: 'VALIDATION',
    [ErrorCode.INVALID_LICENSE_FEE]: 'VALIDATION',
    [ErrorCode.INVALID_EXPIRATION_DATE]: 'VALIDATION',
    [ErrorCode.INVALID_EXTRA_DATA_LENGTH]: 'VALIDATION',
    [ErrorCode.INVALID_PACKED_WORD]: 'VALIDATION',
    [ErrorCode.INVALID_FIELD_VALUE]: 'VALIDATION',
    [ErrorCode.ROYALTY_AMOUNT_MISMATCH]: 'VALIDATION',
    [ErrorCode.EMPTY_LICENSEE_DATA]: 'VALIDATION',
    [ErrorCode.EMPTY_LICENSE_HASH]: 'VALIDATION',
    [ErrorCode.EMPTY_URL]: 'VALIDATION',

    [ErrorCode.VALUE_TRANSFER_FAILED]: 'INFRASTRUCTURE',
    [ErrorCode.INSUFFICIENT_FUNDS]: 'INFRASTRUCTURE',
    [ErrorCode.TRANSACTION_FAILED]: 'INFRASTRUCTURE',
};

export function categoryOf(code: ErrorCode): ErrorCategory {
    return CATEGORY[code];
}

export class LedgerError extends Error {
    public readonly category: ErrorCategory;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Ledger:${code}] ${message}`);
        this.name = 'LedgerError';
        this.category = categoryOf(code);
    }
}

export function isLedgerError(e: unknown): e is LedgerError {
    return e instanceof LedgerError;
}
