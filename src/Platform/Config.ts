/**
 * Service configuration, read from the environment.
 */

import { z } from 'zod';
import { createLedgerConfig } from '../ledger-core/Config.js';
import type { LedgerConfig } from '../ledger-core/Config.js';
import { MAX_KYC_LEVEL } from '../ledger-core/L0/Primitives.js';

// A compliance level, or "off" to leave the operation ungated
const gateLevel = z
    .union([z.literal('off'), z.coerce.number().int().min(0).max(MAX_KYC_LEVEL)])
    .transform(v => (v === 'off' ? null : v));

export const envSchema = z.object({
    LEDGER_REGISTRAR: z.string().min(1).default('registrar'),
    LEDGER_ADMIN: z.string().min(1).optional(),
    LEDGER_DB_PATH: z.string().min(1).default('ledger.db'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LEDGER_ZERO_HARVEST: z.enum(['noop', 'reject']).default('noop'),
    LEDGER_KYC_VOTE: gateLevel.default(1),
    LEDGER_KYC_HARVEST: gateLevel.default(1),
    LEDGER_KYC_TRANSFER: gateLevel.default(1),
    LEDGER_PRESSURE_THRESHOLD: z.coerce.number().int().positive().default(5),
});

export interface ServiceConfig {
    ledger: LedgerConfig;
    port: number;
    dbPath: string;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = envSchema.parse(env);

    return {
        ledger: createLedgerConfig({
            registrar: parsed.LEDGER_REGISTRAR,
            admin: parsed.LEDGER_ADMIN,
            compliance: {
                castVote: parsed.LEDGER_KYC_VOTE,
                harvestDividends: parsed.LEDGER_KYC_HARVEST,
                transferShares: parsed.LEDGER_KYC_TRANSFER,
            },
            zeroHarvest: parsed.LEDGER_ZERO_HARVEST,
            pressureThreshold: parsed.LEDGER_PRESSURE_THRESHOLD,
        }),
        port: parsed.PORT,
        dbPath: parsed.LEDGER_DB_PATH,
    };
}
