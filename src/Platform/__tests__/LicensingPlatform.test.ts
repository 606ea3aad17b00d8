import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createPlatform } from '../LicensingPlatform.js';
import type { LicensingPlatform } from '../LicensingPlatform.js';
import { loadConfig } from '../Config.js';
import { NotFoundError, PolicyViolationError, SecurityViolationError, ValidationError, InfrastructureError, translateError } from '../Errors.js';
import { AccountBook } from '../../infrastructure/environment/AccountBook.js';
import { ManualClock } from '../../infrastructure/environment/Clock.js';
import { generateKeyPair } from '../../kernel-core/L0/Crypto.js';
import type { KeyPair } from '../../kernel-core/L0/Crypto.js';
import { ErrorCode, LedgerError } from '../../kernel-core/Errors.js';
import { ASSET_CREATION, TERMS_URL, T0, signedSubmission } from '../../kernel-core/__tests__/harness.js';

describe('LicensingPlatform', () => {
    let admin: KeyPair;
    let licensee: KeyPair;
    let book: AccountBook;
    let platform: LicensingPlatform;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        [admin, licensee] = await Promise.all([generateKeyPair(), generateKeyPair()]);
        book = new AccountBook();
        platform = createPlatform(
            loadConfig({ LEDGER_MAIN_ADMIN: admin.publicKey, LEDGER_EVENT_DB: ':memory:' }),
            { transfer: book, clock: new ManualClock(T0) }
        );
    });

    afterEach(() => {
        platform.close();
        jest.restoreAllMocks();
    });

    test('commands run end to end and journal to SQLite', async () => {
        expect(await platform.execute({ op: 'addLicense', caller: admin.publicKey, payload: { licenseHash: ASSET_CREATION, termsUrl: TERMS_URL } }))
            .toEqual({ ok: true, result: undefined });
        await platform.execute({ op: 'registerLicensee', caller: licensee.publicKey, payload: { data: 'Studio One' } });
        expect(await platform.execute({ op: 'approveLicensees', caller: admin.publicKey, payload: { ids: [licensee.publicKey] } }))
            .toEqual({ ok: true, result: { applied: [licensee.publicKey], skipped: [] } });

        book.deposit(licensee.publicKey, 5000n);
        const submitted = await platform.execute<'submitApplication'>({
            op: 'submitApplication',
            caller: licensee.publicKey,
            payload: await signedSubmission(licensee)
        });
        if (!submitted.ok) throw submitted.error;
        const { applicationHash, id } = submitted.result;
        expect(id).toBe(0);

        await platform.execute({ op: 'payLicenseFee', caller: licensee.publicKey, payload: { applicationHash } });
        await platform.execute({
            op: 'approveApplication',
            caller: admin.publicKey,
            payload: { licensee: licensee.publicKey, applicationHash }
        });

        expect(platform.kernel.applications.isLicenseUsable(admin.publicKey, licensee.publicKey, applicationHash)).toBe(true);
        expect(book.balanceOf(admin.publicKey)).toBe(1000n);
        expect((await platform.kernel.journal.getHistory()).map((e) => e.event.type)).toEqual([
            'LicenseAdded',
            'LicenseeRegistered',
            'LicenseeApproved',
            'ApplicationSubmitted',
            'LicenseFeePaid',
            'ApplicationApproved'
        ]);
        await expect(platform.verifyJournal()).resolves.toBeUndefined();
    });

    test('failures come back translated by category', async () => {
        const unauthorized = await platform.execute({ op: 'addAdmin', caller: licensee.publicKey, payload: { admin: licensee.publicKey } });
        expect(unauthorized.ok).toBe(false);
        if (unauthorized.ok) return;
        expect(unauthorized.error).toBeInstanceOf(SecurityViolationError);
        expect(unauthorized.error.metadata).toEqual({ actorId: licensee.publicKey, reason: ErrorCode.NOT_MAIN_ADMIN });

        const missing = await platform.execute({ op: 'removeLicense', caller: admin.publicKey, payload: { licenseHash: ASSET_CREATION } });
        expect(missing.ok ? null : missing.error).toBeInstanceOf(NotFoundError);

        const invalid = await platform.execute({ op: 'registerLicensee', caller: licensee.publicKey, payload: { data: '' } });
        expect(invalid.ok ? null : invalid.error).toBeInstanceOf(ValidationError);

        await platform.execute({ op: 'registerLicensee', caller: licensee.publicKey, payload: { data: 'Studio One' } });
        const twice = await platform.execute({ op: 'registerLicensee', caller: licensee.publicKey, payload: { data: 'Studio One' } });
        expect(twice.ok ? null : twice.error).toBeInstanceOf(PolicyViolationError);
    });

    test('unexpected errors become infrastructure errors', () => {
        const error = translateError(new Error('socket closed'), admin.publicKey);
        expect(error).toBeInstanceOf(InfrastructureError);
        expect(error.message).toBe('Unexpected failure: socket closed');

        const transfer = translateError(new LedgerError(ErrorCode.VALUE_TRANSFER_FAILED, 'no funds', { cause: 'INSUFFICIENT_FUNDS' }), admin.publicKey);
        expect(transfer).toBeInstanceOf(InfrastructureError);
        expect(transfer.metadata).toEqual({ underlying: { reason: ErrorCode.VALUE_TRANSFER_FAILED, cause: 'INSUFFICIENT_FUNDS' } });
    });
});
