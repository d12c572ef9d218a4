import type { LedgerConfig } from '../Config.js';
import { LedgerErrorCode } from '../Errors.js';
import type { BlockHeight, CallContext, Principal } from '../L0/Primitives.js';
import { MAX_EXPIRY_BLOCKS, MAX_KYC_LEVEL } from '../L0/Primitives.js';
import { AddressGuard, PrincipalMatchGuard, RangeGuard, enforce, required } from '../L0/Guards.js';
import type { Guard } from '../L0/Guards.js';
import type { ComplianceRecord, LedgerState } from '../L2/State.js';
import { lookup } from '../L2/State.js';

/**
 * Compliance Gate.
 * Records are attested elsewhere; the administrator only files the outcome
 * (approved, level, expiry) here.
 */
export class ComplianceGate {
    constructor(private config: LedgerConfig) { }

    public getRecord(state: LedgerState, address: Principal): ComplianceRecord | undefined {
        return lookup(state.compliance, address);
    }

    public isCompliant(state: LedgerState, address: Principal, requiredLevel: number, atHeight: BlockHeight): boolean {
        const record = this.getRecord(state, address);
        if (!record) return false;
        return record.approved && record.level >= requiredLevel && atHeight < record.expiresAt;
    }

    /**
     * Guard form of the gate. A `null` level means the operation is ungated.
     */
    public readonly guard: Guard<{ state: LedgerState, address: Principal, requiredLevel: number | null, height: BlockHeight }> =
        ({ state, address, requiredLevel, height }) => {
            if (requiredLevel === null || this.isCompliant(state, address, requiredLevel, height)) return { ok: true };
            return {
                ok: false,
                code: LedgerErrorCode.KycRequired,
                violation: `${address} lacks compliance level ${requiredLevel} at height ${height}`,
                details: { address, requiredLevel }
            };
        };

    public setRecord(
        state: LedgerState,
        ctx: CallContext,
        address: Principal,
        approved: boolean,
        level: number,
        expiresAt: BlockHeight
    ): void {
        enforce(
            PrincipalMatchGuard({ actor: ctx.caller, expected: this.config.admin, code: LedgerErrorCode.OwnerOnly, role: 'compliance administrator' }),
            AddressGuard({ address }),
            RangeGuard({ value: level, min: 0, max: MAX_KYC_LEVEL, code: LedgerErrorCode.InvalidKycLevel, label: 'Compliance level' }),
            RangeGuard({ value: expiresAt, min: ctx.height + 1, max: ctx.height + MAX_EXPIRY_BLOCKS, code: LedgerErrorCode.InvalidExpiry, label: 'Expiry height' })
        );
        state.compliance[address] = { address, approved, level, expiresAt };
    }

    public revoke(state: LedgerState, ctx: CallContext, address: Principal): void {
        enforce(PrincipalMatchGuard({ actor: ctx.caller, expected: this.config.admin, code: LedgerErrorCode.OwnerOnly, role: 'compliance administrator' }));
        const record = required(this.getRecord(state, address), `Compliance record for ${address}`);
        state.compliance[address] = { ...record, approved: false };
    }
}
