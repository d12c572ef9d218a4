import type { LedgerConfig } from '../Config.js';
import { LedgerError, LedgerErrorCode } from '../Errors.js';
import type { AssetID, CallContext, Principal } from '../L0/Primitives.js';
import { SUPPLY_PER_ASSET, assetKey, claimKey } from '../L0/Primitives.js';
import { enforce, required } from '../L0/Guards.js';
import { ComplianceGate } from '../L1/Compliance.js';
import type { LedgerState } from '../L2/State.js';
import { readAsset, readBalance, readCash, readClaim, readEscrow } from '../L2/State.js';
import type { SettlementHook } from '../L3/Registry.js';

/**
 * floor(balance * (accrued - claimed) / SUPPLY_PER_ASSET), computed without
 * intermediate precision loss. The remainder stays in escrow: at most one
 * unit of dust per harvest.
 */
export function entitlement(balance: number, accrued: number, claimed: number): number {
    const delta = accrued - claimed;
    if (balance <= 0 || delta <= 0) return 0;
    return Number((BigInt(balance) * BigInt(delta)) / BigInt(SUPPLY_PER_ASSET));
}

/**
 * Dividend Distribution Engine.
 * Pull-based: each holder harvests against the asset's accrual counter and
 * the harvested amount moves from the asset escrow to the holder's cash.
 */
export class DividendEngine implements SettlementHook {
    constructor(
        private config: LedgerConfig,
        private compliance: ComplianceGate
    ) { }

    public harvestDividends(state: LedgerState, ctx: CallContext, assetId: AssetID): number {
        required(readAsset(state, assetId), `Asset ${assetId}`);
        enforce(this.compliance.guard({
            state,
            address: ctx.caller,
            requiredLevel: this.config.compliance.harvestDividends,
            height: ctx.height
        }));

        const amount = this.getPendingDividends(state, ctx.caller, assetId);
        if (amount === 0) {
            if (this.config.zeroHarvest === 'reject') {
                throw new LedgerError(LedgerErrorCode.InvalidAmount, `Nothing to harvest on asset ${assetId}`);
            }
            return 0;
        }

        return this.settle(state, assetId, ctx.caller);
    }

    /**
     * Moves the holder's pending entitlement to cash and advances the claim
     * marker to the current accrual, atomically within the caller's draft.
     */
    public settle(state: LedgerState, assetId: AssetID, holder: Principal): number {
        const asset = required(readAsset(state, assetId), `Asset ${assetId}`);
        const amount = this.getPendingDividends(state, holder, assetId);

        state.claims[claimKey(assetId, holder)] = {
            assetId,
            beneficiary: holder,
            lastClaimedAccrual: asset.accruedRevenue
        };

        if (amount > 0) {
            state.escrow[assetKey(assetId)] = readEscrow(state, assetId) - amount;
            state.cash[holder] = readCash(state, holder) + amount;
        }
        return amount;
    }

    public getPendingDividends(state: LedgerState, holder: Principal, assetId: AssetID): number {
        const asset = readAsset(state, assetId);
        if (!asset) return 0;
        return entitlement(readBalance(state, holder, assetId), asset.accruedRevenue, readClaim(state, assetId, holder));
    }

    public getLastClaim(state: LedgerState, assetId: AssetID, beneficiary: Principal): number {
        return readClaim(state, assetId, beneficiary);
    }

    public getCashBalance(state: LedgerState, holder: Principal): number {
        return readCash(state, holder);
    }

    public getRevenueEscrow(state: LedgerState, assetId: AssetID): number {
        return readEscrow(state, assetId);
    }
}
