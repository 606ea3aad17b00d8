import { z } from 'zod';
import { ValidationError } from './Errors.js';

const identity = z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[0-9a-f]{64}$/, 'must be a 64-character hex Ed25519 public key');

export const ledgerConfigSchema = z
    .object({
        LEDGER_MAIN_ADMIN: identity,
        LEDGER_FEE_RECEIVER: identity.optional(),
        LEDGER_EVENT_DB: z.string().min(1).optional(),
        LEDGER_UNTIMELY_OVERFLOW: z.enum(['saturate', 'wrap']).default('saturate'),
    })
    .transform((env) => ({
        mainAdmin: env.LEDGER_MAIN_ADMIN,
        feeReceiver: env.LEDGER_FEE_RECEIVER ?? env.LEDGER_MAIN_ADMIN,
        eventDb: env.LEDGER_EVENT_DB,
        overflow: env.LEDGER_UNTIMELY_OVERFLOW,
    }));

export type LedgerConfig = z.infer<typeof ledgerConfigSchema>;

/**
 * Reads the ledger configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([key, value]) => key.startsWith('LEDGER_') && value !== undefined && value !== '')
    );
    const parsed = ledgerConfigSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError(`Invalid ledger configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', issues);
    }
    return parsed.data;
}
