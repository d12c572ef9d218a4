import type { LedgerConfig } from '../Config.js';
import { LedgerErrorCode } from '../Errors.js';
import type { AssetID, BlockHeight, CallContext, Principal } from '../L0/Primitives.js';
import { MAX_VALUE, MIN_VALUE, SUPPLY_PER_ASSET, assetKey } from '../L0/Primitives.js';
import { AddressGuard, PrincipalMatchGuard, RangeGuard, TextGuard, enforce, required } from '../L0/Guards.js';
import type { GuardResult } from '../L0/Guards.js';
import { ComplianceGate } from '../L1/Compliance.js';
import type { Asset, LedgerState } from '../L2/State.js';
import { readAsset, readBalance, readEscrow, writeBalance } from '../L2/State.js';

/**
 * Called for both parties before shares move, so that shares never carry
 * revenue accrued before they changed hands.
 */
export interface SettlementHook {
    getPendingDividends(state: LedgerState, holder: Principal, assetId: AssetID): number;
    settle(state: LedgerState, assetId: AssetID, holder: Principal): number;
}

const stricter = (a: number | null, b: number | null): number | null =>
    a === null ? b : b === null ? a : Math.max(a, b);

/**
 * Shares a holder has committed as vote weight on proposals still open at
 * the given height. They stay with the holder until voting closes.
 */
export interface VoteLock {
    lockedShares(state: LedgerState, assetId: AssetID, holder: Principal, height: BlockHeight): number;
}

function totalAccrued(state: LedgerState): number {
    return Object.values(state.assets).reduce((sum, asset) => sum + asset.accruedRevenue, 0);
}

/**
 * Token Ledger & Asset Registry.
 * Owns asset metadata and share balances. Supply is minted once, at
 * tokenization, and only ever moves between holders afterwards.
 */
export class AssetRegistry {
    constructor(
        private config: LedgerConfig,
        private compliance: ComplianceGate,
        private settlement: SettlementHook,
        private votes: VoteLock
    ) { }

    public tokenizeAsset(state: LedgerState, ctx: CallContext, metadataURI: string, value: number): AssetID {
        enforce(
            PrincipalMatchGuard({ actor: ctx.caller, expected: this.config.registrar, code: LedgerErrorCode.NotAuthorized, role: 'registrar' }),
            TextGuard({ text: metadataURI, code: LedgerErrorCode.InvalidURI }),
            RangeGuard({ value, min: MIN_VALUE, max: MAX_VALUE, code: LedgerErrorCode.InvalidValue, label: 'Asset value' })
        );

        // Counter and insert happen in the same draft
        const assetId = state.counters.asset + 1;
        state.counters.asset = assetId;

        state.assets[assetKey(assetId)] = {
            id: assetId,
            owner: ctx.caller,
            metadataURI,
            value,
            locked: false,
            createdAt: ctx.height,
            lastPriceUpdateAt: ctx.height,
            accruedRevenue: 0
        };
        state.escrow[assetKey(assetId)] = 0;
        writeBalance(state, ctx.caller, assetId, SUPPLY_PER_ASSET);

        return assetId;
    }

    public getAssetDetails(state: LedgerState, assetId: AssetID): Asset | undefined {
        return readAsset(state, assetId);
    }

    public getShareBalance(state: LedgerState, holder: Principal, assetId: AssetID): number {
        return readBalance(state, holder, assetId);
    }

    public transferShares(state: LedgerState, ctx: CallContext, assetId: AssetID, recipient: Principal, amount: number): void {
        const asset = required(readAsset(state, assetId), `Asset ${assetId}`);
        const senderBalance = readBalance(state, ctx.caller, assetId);
        const transferable = senderBalance - this.votes.lockedShares(state, assetId, ctx.caller, ctx.height);
        const { transferShares, harvestDividends } = this.config.compliance;
        // A party the transfer pays out must also meet the harvest level
        const level = (holder: Principal) =>
            this.settlement.getPendingDividends(state, holder, assetId) > 0 ? stricter(transferShares, harvestDividends) : transferShares;

        enforce(
            asset.locked
                ? { ok: false, code: LedgerErrorCode.NotAuthorized, violation: `Asset ${assetId} is locked` }
                : { ok: true },
            AddressGuard({ address: recipient }),
            this.distinct(ctx.caller, recipient),
            RangeGuard({ value: amount, min: 1, max: transferable, code: LedgerErrorCode.InvalidAmount, label: 'Transfer amount' }),
            this.compliance.guard({ state, address: ctx.caller, requiredLevel: level(ctx.caller), height: ctx.height }),
            this.compliance.guard({ state, address: recipient, requiredLevel: level(recipient), height: ctx.height })
        );

        this.settlement.settle(state, assetId, ctx.caller);
        this.settlement.settle(state, assetId, recipient);

        writeBalance(state, ctx.caller, assetId, senderBalance - amount);
        writeBalance(state, recipient, assetId, readBalance(state, recipient, assetId) + amount);
    }

    public setAssetLock(state: LedgerState, ctx: CallContext, assetId: AssetID, locked: boolean): void {
        const asset = required(readAsset(state, assetId), `Asset ${assetId}`);
        enforce(PrincipalMatchGuard({ actor: ctx.caller, expected: asset.owner, code: LedgerErrorCode.OwnerOnly, role: `owner of asset ${assetId}` }));
        asset.locked = locked;
    }

    /**
     * Revenue-deposit path: credits the accrual counter and the escrow that
     * backs every future harvest. Accrual summed over all assets stays a safe
     * integer, which bounds every cash and escrow balance.
     */
    public depositRevenue(state: LedgerState, ctx: CallContext, assetId: AssetID, amount: number): number {
        const asset = required(readAsset(state, assetId), `Asset ${assetId}`);
        const depositor: GuardResult = ctx.caller === asset.owner || ctx.caller === this.config.registrar
            ? { ok: true }
            : { ok: false, code: LedgerErrorCode.NotAuthorized, violation: `${ctx.caller} may not deposit revenue for asset ${assetId}` };

        enforce(
            depositor,
            RangeGuard({ value: amount, min: 1, max: Number.MAX_SAFE_INTEGER - totalAccrued(state), code: LedgerErrorCode.InvalidAmount, label: 'Revenue amount' })
        );

        asset.accruedRevenue += amount;
        state.escrow[assetKey(assetId)] = readEscrow(state, assetId) + amount;
        return asset.accruedRevenue;
    }

    private distinct(sender: Principal, recipient: Principal): GuardResult {
        if (sender === recipient) return { ok: false, code: LedgerErrorCode.InvalidAddress, violation: 'Recipient must differ from sender' };
        return { ok: true };
    }
}
