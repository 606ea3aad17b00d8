import type { EntityID, Hash, Hex, DistributiveOmit } from './Primitives.js';
import type { Signature } from './Crypto.js';

// --- 1. License type (catalog entry) ---
export interface License {
    licenseHash: Hash;
    termsUrl: string;
    addedAt: number;
}

// --- 2. Licensee account ---
export interface Licensee {
    id: EntityID;
    data: string;
    usable: boolean;
    registeredAt: number;
}

// --- 3. License agreement (one per licensee x applicationHash) ---
export interface ApplicationData {
    licenseHash: Hash;
    appliedTermsUrl: string;
    /** submissionDate | approvalDate | expirationDate | licenseFee */
    firstPackedWord: bigint;
    /** reportingFrequency | reportingGracePeriod | royaltyGracePeriod | untimely counters | extraData */
    secondPackedWord: bigint;
}

export interface LicenseAgreement {
    licensee: EntityID;
    id: number;
    data: ApplicationData;
    signature: Signature;
    usable: boolean;
    feePaid: boolean;
    modifications: Hex;
}

// --- 4. Royalty reporting ---
export interface Report {
    amountDue: bigint;
    url: string;
    /** submission | approval | deadline | payment | change | extraData */
    packedWord: bigint;
}

/**
 * Append-only report log. `currentIndex` caches `reports.length - 1`
 * (-1 while empty); entries are never reordered or removed.
 */
export interface LicenseRecord {
    licensee: EntityID;
    applicationHash: Hash;
    reports: Report[];
    currentIndex: number;
}

// --- 5. Events ---
interface Keyed {
    licensee: EntityID;
    applicationHash: Hash;
    timestamp: number;
}

export type LedgerEvent =
    | { type: 'AdminAdded'; admin: EntityID; timestamp: number }
    | { type: 'AdminRemoved'; admin: EntityID; timestamp: number }
    | { type: 'LicenseAdded'; licenseHash: Hash; termsUrl: string; timestamp: number }
    | { type: 'LicenseUpdated'; licenseHash: Hash; termsUrl: string; timestamp: number }
    | { type: 'LicenseRemoved'; licenseHash: Hash; timestamp: number }
    | { type: 'LicenseeRegistered'; licensee: EntityID; timestamp: number }
    | { type: 'LicenseeUpdated'; licensee: EntityID; timestamp: number }
    | { type: 'LicenseeApproved'; licensee: EntityID; timestamp: number }
    | { type: 'LicenseeSuspended'; licensee: EntityID; timestamp: number }
    | { type: 'LicenseeRemoved'; licensee: EntityID; timestamp: number }
    | (Keyed & { type: 'ApplicationSubmitted'; id: number; licenseHash: Hash })
    | (Keyed & { type: 'LicenseFeePaid'; amount: bigint })
    | (Keyed & { type: 'ApplicationApproved' })
    | (Keyed & { type: 'ApplicationUsabilityChanged'; usable: boolean })
    | (Keyed & { type: 'ApplicationRemoved'; reason: string })
    | (Keyed & { type: 'ModificationsAdded'; modifications: Hex })
    | (Keyed & { type: 'ApplicationTermsUpdated'; field: string; value: bigint })
    | (Keyed & { type: 'ReportSubmitted'; reportIndex: number })
    | (Keyed & { type: 'ReportChanged'; reportIndex: number })
    | (Keyed & { type: 'ReportApproved'; reportIndex: number; amountDue: bigint; paymentDeadline: bigint })
    | (Keyed & { type: 'ReportExtraDataUpdated'; reportIndex: number })
    | (Keyed & { type: 'RoyaltyPaid'; reportIndex: number; amount: bigint })
    | (Keyed & { type: 'UntimelyReport'; reportIndex?: number; count: number })
    | (Keyed & { type: 'UntimelyRoyaltyPayment'; reportIndex?: number; count: number });

export type LedgerEventType = LedgerEvent['type'];
export type EventOf<T extends LedgerEventType> = Extract<LedgerEvent, { type: T }>;

/** An event as raised inside a transaction; the transaction stamps the time. */
export type PendingEvent = DistributiveOmit<LedgerEvent, 'timestamp'>;
