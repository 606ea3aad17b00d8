import { z } from 'zod';
import type { LedgerEvent } from '../../kernel-core/L0/Ontology.js';

// JSON has no bigint; amounts and packed values travel as tagged decimal strings.
const BIGINT_TAG = '$bigint';

export function encodeJson(value: unknown): string {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? { [BIGINT_TAG]: v.toString() } : v));
}

export function decodeJson(text: string): unknown {
    return JSON.parse(text, (_key, v: unknown) => {
        if (typeof v === 'object' && v !== null && !Array.isArray(v)) {
            const tagged = Object.entries(v);
            const [entry] = tagged;
            if (tagged.length === 1 && entry && entry[0] === BIGINT_TAG && typeof entry[1] === 'string') {
                return BigInt(entry[1]);
            }
        }
        return v;
    });
}

const id = z.string().min(1);
const timestamp = z.number().int();
const index = z.number().int().nonnegative();

const keyed = { licensee: id, applicationHash: id, timestamp };

const ledgerEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('AdminAdded'), admin: id, timestamp }),
    z.object({ type: z.literal('AdminRemoved'), admin: id, timestamp }),
    z.object({ type: z.literal('LicenseAdded'), licenseHash: id, termsUrl: z.string(), timestamp }),
    z.object({ type: z.literal('LicenseUpdated'), licenseHash: id, termsUrl: z.string(), timestamp }),
    z.object({ type: z.literal('LicenseRemoved'), licenseHash: id, timestamp }),
    z.object({ type: z.literal('LicenseeRegistered'), licensee: id, timestamp }),
    z.object({ type: z.literal('LicenseeUpdated'), licensee: id, timestamp }),
    z.object({ type: z.literal('LicenseeApproved'), licensee: id, timestamp }),
    z.object({ type: z.literal('LicenseeSuspended'), licensee: id, timestamp }),
    z.object({ type: z.literal('LicenseeRemoved'), licensee: id, timestamp }),
    z.object({ type: z.literal('ApplicationSubmitted'), ...keyed, id: index, licenseHash: id }),
    z.object({ type: z.literal('LicenseFeePaid'), ...keyed, amount: z.bigint() }),
    z.object({ type: z.literal('ApplicationApproved'), ...keyed }),
    z.object({ type: z.literal('ApplicationUsabilityChanged'), ...keyed, usable: z.boolean() }),
    z.object({ type: z.literal('ApplicationRemoved'), ...keyed, reason: z.string() }),
    z.object({ type: z.literal('ModificationsAdded'), ...keyed, modifications: z.string() }),
    z.object({ type: z.literal('ApplicationTermsUpdated'), ...keyed, field: z.string(), value: z.bigint() }),
    z.object({ type: z.literal('ReportSubmitted'), ...keyed, reportIndex: index }),
    z.object({ type: z.literal('ReportChanged'), ...keyed, reportIndex: index }),
    z.object({
        type: z.literal('ReportApproved'),
        ...keyed,
        reportIndex: index,
        amountDue: z.bigint(),
        paymentDeadline: z.bigint(),
    }),
    z.object({ type: z.literal('ReportExtraDataUpdated'), ...keyed, reportIndex: index }),
    z.object({ type: z.literal('RoyaltyPaid'), ...keyed, reportIndex: index, amount: z.bigint() }),
    z.object({ type: z.literal('UntimelyReport'), ...keyed, reportIndex: index.optional(), count: index }),
    z.object({ type: z.literal('UntimelyRoyaltyPayment'), ...keyed, reportIndex: index.optional(), count: index }),
]);

/** Parses a stored event; throws if the payload does not describe a known event. */
export function decodeEvent(text: string): LedgerEvent {
    return ledgerEventSchema.parse(decodeJson(text));
}
