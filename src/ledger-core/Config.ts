import type { Principal } from './L0/Primitives.js';

export type ZeroHarvestPolicy = 'noop' | 'reject';

/**
 * Required compliance level per gated operation; `null` leaves the operation
 * ungated.
 */
export interface CompliancePolicy {
    castVote: number | null;
    harvestDividends: number | null;
    transferShares: number | null;
}

export interface LedgerConfig {
    registrar: Principal;
    admin: Principal;
    compliance: CompliancePolicy;
    zeroHarvest: ZeroHarvestPolicy;
    pressureThreshold: number;
}

export const DEFAULT_COMPLIANCE_POLICY: CompliancePolicy = {
    castVote: 1,
    harvestDividends: 1,
    transferShares: 1,
};

export interface LedgerConfigInput {
    registrar: Principal;
    admin?: Principal;
    compliance?: Partial<CompliancePolicy>;
    zeroHarvest?: ZeroHarvestPolicy;
    pressureThreshold?: number;
}

export function createLedgerConfig(input: LedgerConfigInput): LedgerConfig {
    return {
        registrar: input.registrar,
        admin: input.admin ?? input.registrar,
        compliance: { ...DEFAULT_COMPLIANCE_POLICY, ...input.compliance },
        zeroHarvest: input.zeroHarvest ?? 'noop',
        pressureThreshold: input.pressureThreshold ?? 5,
    };
}
