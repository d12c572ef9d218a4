import type { LedgerConfig } from '../Config.js';
import { LedgerErrorCode } from '../Errors.js';
import type { AssetID, BlockHeight, CallContext, Principal } from '../L0/Primitives.js';
import { MAX_PRICE_DECIMALS, SUPPLY_PER_ASSET, assetKey } from '../L0/Primitives.js';
import { AddressGuard, FreshnessGuard, PrincipalMatchGuard, RangeGuard, enforce, required } from '../L0/Guards.js';
import type { LedgerState, MarketPrice } from '../L2/State.js';
import { lookup, readAsset, readBalance } from '../L2/State.js';

/**
 * Market Data Cache.
 * Stores what the registered oracle reports. Anything that prices a position
 * must read through getValidatedPrice so a stale tuple is never trusted.
 */
export class MarketDataCache {
    constructor(private config: LedgerConfig) { }

    public registerOracle(state: LedgerState, ctx: CallContext, assetId: AssetID, oracle: Principal): void {
        enforce(PrincipalMatchGuard({ actor: ctx.caller, expected: this.config.admin, code: LedgerErrorCode.OwnerOnly, role: 'market administrator' }));
        required(readAsset(state, assetId), `Asset ${assetId}`);
        enforce(
            AddressGuard({ address: oracle }),
            this.getOracle(state, assetId) === undefined
                ? { ok: true }
                : { ok: false, code: LedgerErrorCode.AlreadyListed, violation: `Asset ${assetId} already has an oracle` }
        );
        state.oracles[assetKey(assetId)] = oracle;
    }

    public getOracle(state: LedgerState, assetId: AssetID): Principal | undefined {
        return lookup(state.oracles, assetKey(assetId));
    }

    public setPrice(state: LedgerState, ctx: CallContext, assetId: AssetID, price: number, decimals: number): void {
        const asset = required(readAsset(state, assetId), `Asset ${assetId}`);
        enforce(
            PrincipalMatchGuard({
                actor: ctx.caller,
                expected: this.getOracle(state, assetId) ?? '',
                code: LedgerErrorCode.NotAuthorized,
                role: `oracle for asset ${assetId}`
            }),
            RangeGuard({ value: price, min: 1, max: Number.MAX_SAFE_INTEGER, code: LedgerErrorCode.InvalidAmount, label: 'Price' }),
            RangeGuard({ value: decimals, min: 0, max: MAX_PRICE_DECIMALS, code: LedgerErrorCode.InvalidValue, label: 'Decimals' })
        );

        state.prices[assetKey(assetId)] = {
            assetId,
            price,
            decimals,
            lastUpdatedAt: ctx.height,
            oracleAddress: ctx.caller
        };
        asset.lastPriceUpdateAt = ctx.height;
    }

    public getMarketPrice(state: LedgerState, assetId: AssetID): MarketPrice | undefined {
        return lookup(state.prices, assetKey(assetId));
    }

    public getValidatedPrice(state: LedgerState, assetId: AssetID, maxStalenessBlocks: number, height: BlockHeight): MarketPrice {
        const price = required(this.getMarketPrice(state, assetId), `Price for asset ${assetId}`);
        enforce(
            RangeGuard({ value: maxStalenessBlocks, min: 0, max: Number.MAX_SAFE_INTEGER, code: LedgerErrorCode.InvalidValue, label: 'Staleness window' }),
            FreshnessGuard({ updatedAt: price.lastUpdatedAt, height, maxStaleness: maxStalenessBlocks })
        );
        return price;
    }

    /**
     * Value of a holder's shares in price units (same decimals as the price).
     */
    public getPositionValue(
        state: LedgerState,
        holder: Principal,
        assetId: AssetID,
        maxStalenessBlocks: number,
        height: BlockHeight
    ): number {
        const { price } = this.getValidatedPrice(state, assetId, maxStalenessBlocks, height);
        const balance = readBalance(state, holder, assetId);
        return Number((BigInt(balance) * BigInt(price)) / BigInt(SUPPLY_PER_ASSET));
    }
}
