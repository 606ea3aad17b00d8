import { LicensingKernel } from '../Kernel.js';
import { generateKeyPair, signDigest } from '../L0/Crypto.js';
import type { KeyPair } from '../L0/Crypto.js';
import { packApplicationTerms } from '../L0/Bitfield.js';
import type { ApplicationTerms } from '../L0/Bitfield.js';
import type { Hash } from '../L0/Primitives.js';
import { licenseHashOf } from '../L1/Catalog.js';
import { applicationHashOf } from '../L3/Applications.js';
import type { IEventStore, JournalEntry } from '../L5/Journal.js';
import type { ApplicationSubmission, OverflowPolicy } from '../L3/Applications.js';
import { ManualClock } from '../../infrastructure/environment/Clock.js';
import { AccountBook } from '../../infrastructure/environment/AccountBook.js';
import { Ed25519Verifier } from '../../infrastructure/environment/Ed25519Verifier.js';

// Shared fixtures for ledger tests.

export const T0 = 1_700_000_000;
export const YEAR = 31_536_000;
export const QUARTER = 7_890_000;
export const FORTNIGHT = 1_209_600;
export const STARTING_BALANCE = 10n ** 18n;

export const ASSET_CREATION: Hash = licenseHashOf('Asset Creation');
export const TERMS_URL = 'https://licenses.test/asset-creation';

export const DEFAULT_TERMS: Partial<ApplicationTerms> = {
    expirationDate: BigInt(T0 + YEAR),
    licenseFee: 1000n,
    reportingFrequency: BigInt(QUARTER),
    reportingGracePeriod: BigInt(FORTNIGHT),
    royaltyGracePeriod: BigInt(FORTNIGHT)
};

/** In-memory journal store whose appends can be made to fail. */
export class SwitchableStore implements IEventStore {
    public entries: JournalEntry[] = [];
    public failing = false;

    async append(entries: readonly JournalEntry[]): Promise<void> {
        if (this.failing) throw new Error('disk full');
        this.entries.push(...entries);
    }
    async getHistory(): Promise<JournalEntry[]> {
        return [...this.entries];
    }
    async getLatest(): Promise<JournalEntry | null> {
        return this.entries[this.entries.length - 1] ?? null;
    }
}

export interface Harness {
    kernel: LicensingKernel;
    clock: ManualClock;
    book: AccountBook;
    admin: KeyPair;
    licensee: KeyPair;
    stranger: KeyPair;
}

export async function createHarness(overflow?: OverflowPolicy, store?: IEventStore): Promise<Harness> {
    const [admin, licensee, stranger] = await Promise.all([generateKeyPair(), generateKeyPair(), generateKeyPair()]);
    const clock = new ManualClock(T0);
    const book = new AccountBook();
    const kernel = new LicensingKernel({
        mainAdmin: admin.publicKey,
        overflow,
        clock,
        verifier: new Ed25519Verifier(),
        transfer: book,
        store
    });
    return { kernel, clock, book, admin, licensee, stranger };
}

/** License type in the catalog; licensee registered, approved and funded. */
export async function onboard(h: Harness): Promise<void> {
    await h.kernel.catalog.addLicense(h.admin.publicKey, ASSET_CREATION, TERMS_URL);
    await h.kernel.directory.registerLicensee(h.licensee.publicKey, 'Studio One');
    await h.kernel.directory.approveLicensees(h.admin.publicKey, [h.licensee.publicKey]);
    h.book.deposit(h.licensee.publicKey, STARTING_BALANCE);
}

export async function signedSubmission(
    signer: KeyPair,
    terms: Partial<ApplicationTerms> = DEFAULT_TERMS,
    overrides: Partial<Omit<ApplicationSubmission, 'signature'>> = {}
): Promise<ApplicationSubmission> {
    const { firstWord, secondWord } = packApplicationTerms(terms);
    const unsigned = {
        licenseHash: ASSET_CREATION,
        appliedTermsUrl: `${TERMS_URL}/v1`,
        firstWord,
        secondWord,
        modifications: '',
        salt: '01',
        ...overrides
    };
    const digest = applicationHashOf({ licensee: signer.publicKey, ...unsigned });
    return { ...unsigned, signature: await signDigest(digest, signer.privateKey) };
}

/** Submits, pays and approves an application at the current clock time. */
export async function approvedApplication(h: Harness, terms: Partial<ApplicationTerms> = DEFAULT_TERMS, salt = '01'): Promise<Hash> {
    const submission = await signedSubmission(h.licensee, terms, { salt });
    const { applicationHash } = await h.kernel.applications.submitApplication(h.licensee.publicKey, submission);
    await h.kernel.applications.payLicenseFee(h.licensee.publicKey, applicationHash);
    await h.kernel.applications.approveApplication(h.admin.publicKey, h.licensee.publicKey, applicationHash);
    return applicationHash;
}
