import { describe, test, expect, beforeEach } from '@jest/globals';
import { ErrorCode } from '../../Errors.js';
import {
    createHarness,
    onboard,
    approvedApplication,
    SwitchableStore,
    FORTNIGHT,
    QUARTER,
    STARTING_BALANCE,
    T0
} from '../../__tests__/harness.js';
import type { Harness } from '../../__tests__/harness.js';

describe('RoyaltyLedger', () => {
    let h: Harness;
    let app: string;
    let licensee: string;
    let admin: string;

    beforeEach(async () => {
        h = await createHarness();
        await onboard(h);
        app = await approvedApplication(h);
        licensee = h.licensee.publicKey;
        admin = h.admin.publicKey;
    });

    const untimelyReports = () =>
        h.kernel.applications.getApplicationField(admin, licensee, app, 'untimelyReportCount');
    const untimelyPayments = () =>
        h.kernel.applications.getApplicationField(admin, licensee, app, 'untimelyRoyaltyPaymentCount');

    describe('submitReport', () => {
        test('the first report waits one reporting period after approval', async () => {
            h.clock.set(T0 + QUARTER - 1);
            await expect(h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1')).rejects.toMatchObject({
                code: ErrorCode.NEW_REPORT_NOT_YET_ALLOWED
            });

            h.clock.set(T0 + QUARTER);
            expect(await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1')).toBe(0);
            expect(h.kernel.royalties.getReport(licensee, licensee, app, 0)).toEqual({
                index: 0,
                url: 'https://reports.test/q1',
                amountDue: 0n,
                submissionTimestamp: BigInt(T0 + QUARTER),
                approvalTimestamp: 0n,
                paymentDeadline: 0n,
                paymentTimestamp: 0n,
                changeTimestamp: 0n,
                extraData: 0n
            });
            expect(untimelyReports()).toBe(0n);
        });

        test('later reports are gated on the previous submission', async () => {
            h.clock.set(T0 + QUARTER + 100);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');

            h.clock.set(T0 + 2 * QUARTER + 99);
            await expect(h.kernel.royalties.submitReport(admin, licensee, app, 'https://reports.test/q2')).rejects.toMatchObject({
                code: ErrorCode.NEW_REPORT_NOT_YET_ALLOWED
            });

            h.clock.set(T0 + 2 * QUARTER + 100);
            expect(await h.kernel.royalties.submitReport(admin, licensee, app, 'https://reports.test/q2')).toBe(1);
            expect(h.kernel.royalties.getReportCount(licensee, licensee, app)).toBe(2);
            expect(h.kernel.royalties.getLicenseRecord(licensee, licensee, app).currentIndex).toBe(1);
        });

        test('a late report is accepted and counted once', async () => {
            h.clock.set(T0 + QUARTER + FORTNIGHT + 1);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');

            expect(untimelyReports()).toBe(1n);
            const events = (await h.kernel.journal.getHistory()).slice(-2).map((e) => e.event);
            expect(events).toEqual([
                { type: 'UntimelyReport', licensee, applicationHash: app, reportIndex: 0, count: 1, timestamp: T0 + QUARTER + FORTNIGHT + 1 },
                { type: 'ReportSubmitted', licensee, applicationHash: app, reportIndex: 0, timestamp: T0 + QUARTER + FORTNIGHT + 1 }
            ]);
        });

        test('a report at the end of the grace period is on time', async () => {
            h.clock.set(T0 + QUARTER + FORTNIGHT);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');
            expect(untimelyReports()).toBe(0n);
        });

        test('reports need an existing, usable application and an authorized caller', async () => {
            const royalties = h.kernel.royalties;
            h.clock.set(T0 + QUARTER);
            await expect(royalties.submitReport(h.stranger.publicKey, licensee, app, 'u')).rejects.toMatchObject({
                code: ErrorCode.NOT_OWNER_OR_LICENSE_OWNER
            });
            await expect(royalties.submitReport(licensee, licensee, 'f'.repeat(64), 'u')).rejects.toMatchObject({
                code: ErrorCode.APPLICATION_NOT_FOUND
            });
            await expect(royalties.submitReport(licensee, licensee, app, '')).rejects.toMatchObject({ code: ErrorCode.EMPTY_URL });

            await h.kernel.applications.updateLicenseUsable(admin, licensee, app);
            await expect(royalties.submitReport(licensee, licensee, app, 'u')).rejects.toMatchObject({
                code: ErrorCode.LICENSE_NOT_USABLE
            });
            expect(royalties.getReportCount(admin, licensee, app)).toBe(0);
        });
    });

    describe('changeReport and approveReport', () => {
        beforeEach(async () => {
            h.clock.set(T0 + QUARTER);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');
        });

        test('an unapproved report can be changed', async () => {
            h.clock.advance(10);
            await h.kernel.royalties.changeReport(licensee, licensee, app, 0, 'https://reports.test/q1-fixed');
            const report = h.kernel.royalties.getCurrentReport(admin, licensee, app);
            expect(report.url).toBe('https://reports.test/q1-fixed');
            expect(report.changeTimestamp).toBe(BigInt(T0 + QUARTER + 10));
            expect(report.submissionTimestamp).toBe(BigInt(T0 + QUARTER));
        });

        test('missing reports are reported precisely', async () => {
            const royalties = h.kernel.royalties;
            await expect(royalties.changeReport(licensee, licensee, app, 1, 'u')).rejects.toMatchObject({
                code: ErrorCode.REPORT_DOESNT_EXIST
            });
            await expect(royalties.approveReport(admin, licensee, 'f'.repeat(64), 0, 1n, 1n)).rejects.toMatchObject({
                code: ErrorCode.NO_REPORTS_FOUND
            });
        });

        test('approval sets the amount and deadline, once', async () => {
            const royalties = h.kernel.royalties;
            const deadline = BigInt(T0 + QUARTER + 30 * 86_400);
            await expect(royalties.approveReport(licensee, licensee, app, 0, deadline, 500n)).rejects.toMatchObject({
                code: ErrorCode.UNAUTHORIZED
            });
            await royalties.approveReport(admin, licensee, app, 0, deadline, 500n);

            const report = royalties.getReport(licensee, licensee, app, 0);
            expect(report.amountDue).toBe(500n);
            expect(report.paymentDeadline).toBe(deadline);
            expect(report.approvalTimestamp).toBe(BigInt(T0 + QUARTER));

            await expect(royalties.approveReport(admin, licensee, app, 0, deadline, 500n)).rejects.toMatchObject({
                code: ErrorCode.REPORT_ALREADY_APPROVED
            });
            await expect(royalties.changeReport(licensee, licensee, app, 0, 'u')).rejects.toMatchObject({
                code: ErrorCode.REPORT_ALREADY_APPROVED
            });
        });

        test('approval validates the deadline width and amount sign', async () => {
            const royalties = h.kernel.royalties;
            await expect(royalties.approveReport(admin, licensee, app, 0, 1n << 40n, 1n)).rejects.toMatchObject({
                code: ErrorCode.INVALID_FIELD_VALUE
            });
            await expect(royalties.approveReport(admin, licensee, app, 0, 1n, -1n)).rejects.toMatchObject({
                code: ErrorCode.INVALID_FIELD_VALUE
            });
        });

        test('a deadline at the 40-bit limit is accepted', async () => {
            const limit = (1n << 40n) - 1n;
            await h.kernel.royalties.approveReport(admin, licensee, app, 0, limit, 1n);
            expect(h.kernel.royalties.getReportField(admin, licensee, app, 0, 'paymentDeadline')).toBe(limit);
            expect(h.kernel.royalties.getReportField(admin, licensee, app, 0, 'approvalTimestamp')).toBe(BigInt(T0 + QUARTER));
        });

        test('report extra data is bounded to 56 bits', async () => {
            const royalties = h.kernel.royalties;
            await royalties.updateReportExtraData(admin, licensee, app, 0, (1n << 56n) - 1n);
            expect(royalties.getReportField(admin, licensee, app, 0, 'extraData')).toBe((1n << 56n) - 1n);
            await expect(royalties.updateReportExtraData(admin, licensee, app, 0, 1n << 56n)).rejects.toMatchObject({
                code: ErrorCode.INVALID_EXTRA_DATA_LENGTH
            });
        });
    });

    describe('payRoyalty', () => {
        const deadline = BigInt(T0 + QUARTER + 86_400);

        beforeEach(async () => {
            h.clock.set(T0 + QUARTER);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');
        });

        test('an unapproved report cannot be paid', async () => {
            await expect(h.kernel.royalties.payRoyalty(licensee, app, 0, 0n)).rejects.toMatchObject({
                code: ErrorCode.REPORT_NOT_YET_APPROVED
            });
        });

        test('only the exact amount due is accepted, once', async () => {
            const royalties = h.kernel.royalties;
            await royalties.approveReport(admin, licensee, app, 0, deadline, 700n);
            await expect(royalties.payRoyalty(licensee, app, 0, 699n)).rejects.toMatchObject({ code: ErrorCode.ROYALTY_AMOUNT_MISMATCH });
            await expect(royalties.payRoyalty(licensee, app, 0, 701n)).rejects.toMatchObject({ code: ErrorCode.ROYALTY_AMOUNT_MISMATCH });

            h.clock.advance(5);
            await royalties.payRoyalty(licensee, app, 0, 700n);
            expect(royalties.getReportField(licensee, licensee, app, 0, 'paymentTimestamp')).toBe(BigInt(T0 + QUARTER + 5));
            expect(h.book.balanceOf(admin)).toBe(1700n);
            expect(h.book.balanceOf(licensee)).toBe(STARTING_BALANCE - 1700n);
            expect(untimelyPayments()).toBe(0n);

            await expect(royalties.payRoyalty(licensee, app, 0, 700n)).rejects.toMatchObject({ code: ErrorCode.ROYALTY_ALREADY_PAID });
        });

        test('only the licensee pays', async () => {
            await h.kernel.royalties.approveReport(admin, licensee, app, 0, deadline, 700n);
            await expect(h.kernel.royalties.payRoyalty(admin, app, 0, 700n)).rejects.toMatchObject({
                code: ErrorCode.APPLICATION_NOT_FOUND
            });
        });

        test('a late payment succeeds and is counted after the fact', async () => {
            const royalties = h.kernel.royalties;
            await royalties.approveReport(admin, licensee, app, 0, deadline, 700n);

            h.clock.set(Number(deadline) + FORTNIGHT + 1);
            await royalties.payRoyalty(licensee, app, 0, 700n);
            expect(untimelyPayments()).toBe(1n);

            const types = (await h.kernel.journal.getHistory()).slice(-2).map((e) => e.event.type);
            expect(types).toEqual(['RoyaltyPaid', 'UntimelyRoyaltyPayment']);
        });

        test('a failed transfer leaves the report unpaid', async () => {
            const royalties = h.kernel.royalties;
            await royalties.approveReport(admin, licensee, app, 0, deadline, STARTING_BALANCE);

            await expect(royalties.payRoyalty(licensee, app, 0, STARTING_BALANCE)).rejects.toMatchObject({
                code: ErrorCode.VALUE_TRANSFER_FAILED
            });
            expect(royalties.getReportField(licensee, licensee, app, 0, 'paymentTimestamp')).toBe(0n);
            expect(h.book.balanceOf(licensee)).toBe(STARTING_BALANCE - 1000n);
        });

        test('a royalty is paid back when the payment cannot be journalled', async () => {
            const store = new SwitchableStore();
            const flaky = await createHarness(undefined, store);
            await onboard(flaky);
            const flakyApp = await approvedApplication(flaky);
            const payer = flaky.licensee.publicKey;
            flaky.clock.set(T0 + QUARTER);
            await flaky.kernel.royalties.submitReport(payer, payer, flakyApp, 'https://reports.test/q1');
            await flaky.kernel.royalties.approveReport(flaky.admin.publicKey, payer, flakyApp, 0, deadline, 700n);

            store.failing = true;
            await expect(flaky.kernel.royalties.payRoyalty(payer, flakyApp, 0, 700n)).rejects.toMatchObject({
                code: ErrorCode.TRANSACTION_FAILED
            });
            expect(flaky.kernel.royalties.getReportField(payer, payer, flakyApp, 0, 'paymentTimestamp')).toBe(0n);
            expect(flaky.book.balanceOf(payer)).toBe(STARTING_BALANCE - 1000n);
            expect(flaky.book.balanceOf(flaky.admin.publicKey)).toBe(1000n);
        });

        test('older reports can be settled out of order', async () => {
            const royalties = h.kernel.royalties;
            h.clock.set(T0 + 2 * QUARTER);
            await royalties.submitReport(licensee, licensee, app, 'https://reports.test/q2');
            await royalties.approveReport(admin, licensee, app, 1, BigInt(T0 + 3 * QUARTER), 20n);
            await royalties.approveReport(admin, licensee, app, 0, BigInt(T0 + 3 * QUARTER), 10n);

            await royalties.payRoyalty(licensee, app, 1, 20n);
            await royalties.payRoyalty(licensee, app, 0, 10n);
            expect(royalties.getReportField(admin, licensee, app, 0, 'paymentTimestamp')).toBe(BigInt(T0 + 2 * QUARTER));
            expect(royalties.getReportField(admin, licensee, app, 1, 'paymentTimestamp')).toBe(BigInt(T0 + 2 * QUARTER));
        });
    });

    describe('reads', () => {
        test('an untouched application has an empty record', () => {
            expect(h.kernel.royalties.getLicenseRecord(licensee, licensee, app)).toEqual({
                licensee,
                applicationHash: app,
                reports: [],
                currentIndex: -1
            });
            expect(() => h.kernel.royalties.getCurrentReport(licensee, licensee, app)).toThrow('[Ledger:NO_REPORTS_FOUND]');
        });

        test('records are private to the licensee and admins', () => {
            expect(() => h.kernel.royalties.getReportCount(h.stranger.publicKey, licensee, app)).toThrow(
                '[Ledger:NOT_OWNER_OR_LICENSE_OWNER]'
            );
        });

        test('the report history survives removal of its application', async () => {
            h.clock.set(T0 + QUARTER);
            await h.kernel.royalties.submitReport(licensee, licensee, app, 'https://reports.test/q1');
            await h.kernel.applications.removeApplication(licensee, licensee, app, 'terminated');

            expect(h.kernel.royalties.getReportCount(admin, licensee, app)).toBe(1);
            expect(h.kernel.royalties.getReport(admin, licensee, app, 0).url).toBe('https://reports.test/q1');
            await expect(h.kernel.royalties.submitReport(licensee, licensee, app, 'u')).rejects.toMatchObject({
                code: ErrorCode.APPLICATION_NOT_FOUND
            });
        });
    });
});
