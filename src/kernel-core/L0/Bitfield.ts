// src/kernel-core/L0/Bitfield.ts
// Fixed-width field packing over 256-bit words.

export const WORD_BITS = 256n;
export const WORD_MAX = (1n << WORD_BITS) - 1n;

export interface BitField {
    readonly offset: bigint;
    readonly width: bigint;
}

export type FieldValues<K extends string> = Record<K, bigint>;

export function fieldMask(field: BitField): bigint {
    return (1n << field.width) - 1n;
}

export function isWord(value: bigint): boolean {
    return value >= 0n && value <= WORD_MAX;
}

/**
 * A named sequence of contiguous bit fields inside one word, laid out from bit 0
 * upwards in declaration order.
 *
 * The codec never validates widths: values are masked on the way in, and callers
 * check `fits` first wherever an overflow must be rejected.
 */
export class PackedLayout<K extends string> {
    private readonly fields = new Map<K, BitField>();
    private readonly names: ReadonlySet<string>;
    public readonly keys: readonly K[];

    constructor(public readonly name: string, widths: ReadonlyArray<readonly [K, bigint]>) {
        let offset = 0n;
        for (const [key, width] of widths) {
            if (width <= 0n) throw new Error(`Layout ${name}: field ${key} has no width`);
            if (this.fields.has(key)) throw new Error(`Layout ${name}: duplicate field ${key}`);
            this.fields.set(key, { offset, width });
            offset += width;
        }
        if (offset > WORD_BITS) {
            throw new Error(`Layout ${name}: ${offset} bits do not fit a ${WORD_BITS}-bit word`);
        }
        this.keys = widths.map(([key]) => key);
        this.names = new Set(this.keys);
    }

    public has(key: string): key is K {
        return this.names.has(key);
    }

    public field(key: K): BitField {
        const f = this.fields.get(key);
        if (!f) throw new Error(`Layout ${this.name}: unknown field ${key}`);
        return f;
    }

    public max(key: K): bigint {
        return fieldMask(this.field(key));
    }

    public fits(key: K, value: bigint): boolean {
        return value >= 0n && value <= this.max(key);
    }

    public pack(values: Partial<FieldValues<K>>): bigint {
        let word = 0n;
        for (const key of this.keys) {
            const value = values[key];
            if (value === undefined) continue;
            word = this.set(word, key, value);
        }
        return word;
    }

    public unpack(word: bigint, key: K): bigint {
        const f = this.field(key);
        return (word >> f.offset) & fieldMask(f);
    }

    /** Every field of the word, in layout order. */
    public unpackAll(word: bigint): Map<K, bigint> {
        return new Map(this.keys.map((key) => [key, this.unpack(word, key)] as const));
    }

    /**
     * Clears the field's bits, then ORs in the new value. Every other field is
     * left bit-for-bit as it was.
     */
    public set(word: bigint, key: K, value: bigint): bigint {
        const f = this.field(key);
        const slot = fieldMask(f) << f.offset;
        return (word & ~slot) | ((value << f.offset) & slot);
    }
}

export type LayoutField<L> = L extends PackedLayout<infer K> ? K : never;

// --- Ledger layouts ---

export const FIRST_WORD = new PackedLayout('application.first', [
    ['submissionDate', 40n],
    ['approvalDate', 40n],
    ['expirationDate', 40n],
    ['licenseFee', 136n],
] as const);

export const SECOND_WORD = new PackedLayout('application.second', [
    ['reportingFrequency', 32n],
    ['reportingGracePeriod', 32n],
    ['royaltyGracePeriod', 32n],
    ['untimelyReportCount', 8n],
    ['untimelyRoyaltyPaymentCount', 8n],
    ['extraData', 144n],
] as const);

export const REPORT_WORD = new PackedLayout('report', [
    ['submissionTimestamp', 40n],
    ['approvalTimestamp', 40n],
    ['paymentDeadline', 40n],
    ['paymentTimestamp', 40n],
    ['changeTimestamp', 40n],
    ['extraData', 56n],
] as const);

export type FirstWordField = LayoutField<typeof FIRST_WORD>;
export type SecondWordField = LayoutField<typeof SECOND_WORD>;
export type ReportField = LayoutField<typeof REPORT_WORD>;
export type ApplicationField = FirstWordField | SecondWordField;

export interface ApplicationTerms {
    submissionDate: bigint;
    approvalDate: bigint;
    expirationDate: bigint;
    licenseFee: bigint;
    reportingFrequency: bigint;
    reportingGracePeriod: bigint;
    royaltyGracePeriod: bigint;
    untimelyReportCount: bigint;
    untimelyRoyaltyPaymentCount: bigint;
    extraData: bigint;
}

export interface ReportTimes {
    submissionTimestamp: bigint;
    approvalTimestamp: bigint;
    paymentDeadline: bigint;
    paymentTimestamp: bigint;
    changeTimestamp: bigint;
    extraData: bigint;
}

/**
 * Packs a set of application terms into its two words (missing fields are 0).
 */
export function packApplicationTerms(terms: Partial<ApplicationTerms>): { firstWord: bigint; secondWord: bigint } {
    return {
        firstWord: FIRST_WORD.pack({
            submissionDate: terms.submissionDate,
            approvalDate: terms.approvalDate,
            expirationDate: terms.expirationDate,
            licenseFee: terms.licenseFee,
        }),
        secondWord: SECOND_WORD.pack({
            reportingFrequency: terms.reportingFrequency,
            reportingGracePeriod: terms.reportingGracePeriod,
            royaltyGracePeriod: terms.royaltyGracePeriod,
            untimelyReportCount: terms.untimelyReportCount,
            untimelyRoyaltyPaymentCount: terms.untimelyRoyaltyPaymentCount,
            extraData: terms.extraData,
        }),
    };
}

export function unpackApplicationTerms(firstWord: bigint, secondWord: bigint): ApplicationTerms {
    return {
        submissionDate: FIRST_WORD.unpack(firstWord, 'submissionDate'),
        approvalDate: FIRST_WORD.unpack(firstWord, 'approvalDate'),
        expirationDate: FIRST_WORD.unpack(firstWord, 'expirationDate'),
        licenseFee: FIRST_WORD.unpack(firstWord, 'licenseFee'),
        reportingFrequency: SECOND_WORD.unpack(secondWord, 'reportingFrequency'),
        reportingGracePeriod: SECOND_WORD.unpack(secondWord, 'reportingGracePeriod'),
        royaltyGracePeriod: SECOND_WORD.unpack(secondWord, 'royaltyGracePeriod'),
        untimelyReportCount: SECOND_WORD.unpack(secondWord, 'untimelyReportCount'),
        untimelyRoyaltyPaymentCount: SECOND_WORD.unpack(secondWord, 'untimelyRoyaltyPaymentCount'),
        extraData: SECOND_WORD.unpack(secondWord, 'extraData'),
    };
}

export function unpackReport(word: bigint): ReportTimes {
    return {
        submissionTimestamp: REPORT_WORD.unpack(word, 'submissionTimestamp'),
        approvalTimestamp: REPORT_WORD.unpack(word, 'approvalTimestamp'),
        paymentDeadline: REPORT_WORD.unpack(word, 'paymentDeadline'),
        paymentTimestamp: REPORT_WORD.unpack(word, 'paymentTimestamp'),
        changeTimestamp: REPORT_WORD.unpack(word, 'changeTimestamp'),
        extraData: REPORT_WORD.unpack(word, 'extraData'),
    };
}
