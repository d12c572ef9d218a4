import { createDraft, finishDraft } from 'immer';
import type { LedgerConfig } from './Config.js';
import { LedgerError, LedgerErrorCode, LedgerIntegrityError } from './Errors.js';
import type { AssetID, BlockHeight, CallContext, Principal, ProposalID } from './L0/Primitives.js';
import { isPrincipal } from './L0/Primitives.js';
import { callContextSchema, ledgerCallSchema } from './L0/Calls.js';
import type { LedgerCall } from './L0/Calls.js';
import { checkInvariants } from './L0/Invariants.js';
import { ComplianceGate } from './L1/Compliance.js';
import { StateModel, stateRoot } from './L2/State.js';
import type { Asset, ComplianceRecord, LedgerState, MarketPrice, Proposal, StateSnapshot, VoteRecord } from './L2/State.js';
import { AssetRegistry } from './L3/Registry.js';
import { DividendEngine } from './L4/Dividends.js';
import { GovernanceEngine } from './L4/Governance.js';
import type { ProposalStatus } from './L4/Governance.js';
import { MarketDataCache } from './L4/Market.js';
import { AuditLog } from './L5/Audit.js';
import type { Evidence } from './L5/Audit.js';

export type KernelLifecycle = 'CONSTITUTED' | 'ACTIVE' | 'SUSPENDED';

export interface Commit {
    evidenceId: string;
    stateRoot: string;
    version: number;
}

/**
 * The Ledger Kernel.
 * Every mutating call is drafted against the committed state, checked against
 * the ledger invariants and published whole, or discarded whole. Each call
 * leaves one audit entry; committed calls also leave one state snapshot.
 */
export class LedgerKernel {
    private lifecycle: KernelLifecycle = 'CONSTITUTED';
    private recording = true;
    private lastCommit: Commit | null = null;

    // Pressure Tracker: error code -> rejection count
    private rejectionTracker: Map<LedgerErrorCode, number> = new Map();

    public readonly compliance: ComplianceGate;
    public readonly registry: AssetRegistry;
    public readonly governance: GovernanceEngine;
    public readonly dividends: DividendEngine;
    public readonly market: MarketDataCache;

    constructor(
        private config: LedgerConfig,
        private audit: AuditLog = new AuditLog(),
        private state: StateModel = new StateModel()
    ) {
        this.compliance = new ComplianceGate(config);
        this.dividends = new DividendEngine(config, this.compliance);
        this.governance = new GovernanceEngine(config, this.compliance);
        this.registry = new AssetRegistry(config, this.compliance, this.dividends, this.governance);
        this.market = new MarketDataCache(config);
    }

    public get Lifecycle(): KernelLifecycle { return this.lifecycle; }
    public get Config(): LedgerConfig { return this.config; }
    public get Audit(): AuditLog { return this.audit; }
    public get State(): LedgerState { return this.state.current; }
    public get LastCommit(): Commit | null { return this.lastCommit; }
    public get StateRoot(): string { return this.state.tip.stateRoot; }

    public getSnapshotChain(): readonly StateSnapshot[] {
        return this.state.getSnapshotChain();
    }

    public verifyIntegrity(): boolean {
        return this.state.verifyIntegrity() && this.audit.verifyChain();
    }

    public boot(): void {
        if (this.lifecycle === 'CONSTITUTED') this.lifecycle = 'ACTIVE';
    }

    public suspend(): void {
        if (this.lifecycle === 'ACTIVE') this.lifecycle = 'SUSPENDED';
    }

    public resume(): void {
        if (this.lifecycle === 'SUSPENDED') this.lifecycle = 'ACTIVE';
    }

    // --- Token Ledger & Asset Registry ---

    public tokenizeAsset(ctx: CallContext, metadataURI: string, value: number): AssetID {
        return this.execute(ctx, { operation: 'tokenizeAsset', args: [metadataURI, value] },
            draft => this.registry.tokenizeAsset(draft, ctx, metadataURI, value));
    }

    public transferShares(ctx: CallContext, assetId: AssetID, recipient: Principal, amount: number): void {
        this.execute(ctx, { operation: 'transferShares', args: [assetId, recipient, amount] },
            draft => this.registry.transferShares(draft, ctx, assetId, recipient, amount));
    }

    public setAssetLock(ctx: CallContext, assetId: AssetID, locked: boolean): void {
        this.execute(ctx, { operation: 'setAssetLock', args: [assetId, locked] },
            draft => this.registry.setAssetLock(draft, ctx, assetId, locked));
    }

    public depositRevenue(ctx: CallContext, assetId: AssetID, amount: number): number {
        return this.execute(ctx, { operation: 'depositRevenue', args: [assetId, amount] },
            draft => this.registry.depositRevenue(draft, ctx, assetId, amount));
    }

    public getAssetDetails(assetId: AssetID): Asset | undefined {
        return this.registry.getAssetDetails(this.State, assetId);
    }

    public getShareBalance(holder: Principal, assetId: AssetID): number {
        return this.registry.getShareBalance(this.State, holder, assetId);
    }

    // --- Compliance Gate ---

    public setComplianceRecord(ctx: CallContext, address: Principal, approved: boolean, level: number, expiresAt: BlockHeight): void {
        this.execute(ctx, { operation: 'setComplianceRecord', args: [address, approved, level, expiresAt] },
            draft => this.compliance.setRecord(draft, ctx, address, approved, level, expiresAt));
    }

    public revokeCompliance(ctx: CallContext, address: Principal): void {
        this.execute(ctx, { operation: 'revokeCompliance', args: [address] },
            draft => this.compliance.revoke(draft, ctx, address));
    }

    public getComplianceRecord(address: Principal): ComplianceRecord | undefined {
        return this.compliance.getRecord(this.State, address);
    }

    public isCompliant(address: Principal, requiredLevel: number, atHeight: BlockHeight): boolean {
        return this.compliance.isCompliant(this.State, address, requiredLevel, atHeight);
    }

    // --- Governance Engine ---

    public initiateProposal(ctx: CallContext, assetId: AssetID, title: string, duration: number, minimumThreshold: number): ProposalID {
        return this.execute(ctx, { operation: 'initiateProposal', args: [assetId, title, duration, minimumThreshold] },
            draft => this.governance.initiateProposal(draft, ctx, assetId, title, duration, minimumThreshold));
    }

    public castVote(ctx: CallContext, proposalId: ProposalID, support: boolean, weight: number): void {
        this.execute(ctx, { operation: 'castVote', args: [proposalId, support, weight] },
            draft => this.governance.castVote(draft, ctx, proposalId, support, weight));
    }

    public finalize(ctx: CallContext, proposalId: ProposalID): boolean {
        return this.execute(ctx, { operation: 'finalize', args: [proposalId] },
            draft => this.governance.finalize(draft, ctx, proposalId));
    }

    public getProposalDetails(proposalId: ProposalID): Proposal | undefined {
        return this.governance.getProposalDetails(this.State, proposalId);
    }

    public getProposalStatus(proposalId: ProposalID, height: BlockHeight): ProposalStatus | undefined {
        return this.governance.getProposalStatus(this.State, proposalId, height);
    }

    public getVoteRecord(proposalId: ProposalID, voter: Principal): VoteRecord | undefined {
        return this.governance.getVoteRecord(this.State, proposalId, voter);
    }

    // --- Dividend Distribution Engine ---

    public harvestDividends(ctx: CallContext, assetId: AssetID): number {
        return this.execute(ctx, { operation: 'harvestDividends', args: [assetId] },
            draft => this.dividends.harvestDividends(draft, ctx, assetId));
    }

    public getLastClaim(assetId: AssetID, beneficiary: Principal): number {
        return this.dividends.getLastClaim(this.State, assetId, beneficiary);
    }

    public getPendingDividends(holder: Principal, assetId: AssetID): number {
        return this.dividends.getPendingDividends(this.State, holder, assetId);
    }

    public getCashBalance(holder: Principal): number {
        return this.dividends.getCashBalance(this.State, holder);
    }

    public getRevenueEscrow(assetId: AssetID): number {
        return this.dividends.getRevenueEscrow(this.State, assetId);
    }

    // --- Market Data Cache ---

    public registerOracle(ctx: CallContext, assetId: AssetID, oracle: Principal): void {
        this.execute(ctx, { operation: 'registerOracle', args: [assetId, oracle] },
            draft => this.market.registerOracle(draft, ctx, assetId, oracle));
    }

    public setPrice(ctx: CallContext, assetId: AssetID, price: number, decimals: number): void {
        this.execute(ctx, { operation: 'setPrice', args: [assetId, price, decimals] },
            draft => this.market.setPrice(draft, ctx, assetId, price, decimals));
    }

    public getMarketPrice(assetId: AssetID): MarketPrice | undefined {
        return this.market.getMarketPrice(this.State, assetId);
    }

    public getValidatedPrice(assetId: AssetID, maxStalenessBlocks: number, height: BlockHeight): MarketPrice {
        return this.market.getValidatedPrice(this.State, assetId, maxStalenessBlocks, height);
    }

    public getPositionValue(holder: Principal, assetId: AssetID, maxStalenessBlocks: number, height: BlockHeight): number {
        return this.market.getPositionValue(this.State, holder, assetId, maxStalenessBlocks, height);
    }

    // --- Generic Entry ---

    /**
     * Routes a recorded call to its entry point. Used by replay and by
     * transports that receive calls as data.
     */
    public apply(ctx: CallContext, call: LedgerCall): number | boolean | void {
        switch (call.operation) {
            case 'tokenizeAsset': return this.tokenizeAsset(ctx, ...call.args);
            case 'transferShares': return this.transferShares(ctx, ...call.args);
            case 'setAssetLock': return this.setAssetLock(ctx, ...call.args);
            case 'depositRevenue': return this.depositRevenue(ctx, ...call.args);
            case 'setComplianceRecord': return this.setComplianceRecord(ctx, ...call.args);
            case 'revokeCompliance': return this.revokeCompliance(ctx, ...call.args);
            case 'initiateProposal': return this.initiateProposal(ctx, ...call.args);
            case 'castVote': return this.castVote(ctx, ...call.args);
            case 'finalize': return this.finalize(ctx, ...call.args);
            case 'harvestDividends': return this.harvestDividends(ctx, ...call.args);
            case 'registerOracle': return this.registerOracle(ctx, ...call.args);
            case 'setPrice': return this.setPrice(ctx, ...call.args);
        }
    }

    /**
     * Re-executes a committed call from the audit log without appending to
     * it, and checks that it lands on the recorded state root.
     */
    public restore(entry: Evidence): void {
        if (entry.status !== 'SUCCESS') return;

        this.recording = false;
        try {
            this.apply(entry.context, entry.call);
        } finally {
            this.recording = true;
        }

        if (this.StateRoot !== entry.stateRoot) {
            throw new LedgerIntegrityError(
                `Replay diverged at ${entry.evidenceId}: expected root ${entry.stateRoot}, got ${this.StateRoot}`
            );
        }
    }

    // --- Atomic Execution ---

    private execute<R>(ctx: CallContext, call: LedgerCall, run: (draft: LedgerState) => R): R {
        if (this.lifecycle !== 'ACTIVE') {
            throw new LedgerIntegrityError(`Kernel cannot execute in state ${this.lifecycle}`);
        }
        // Malformed calls are refused before they can be ordered or recorded
        if (!ledgerCallSchema.safeParse(call).success || !callContextSchema.safeParse(ctx).success) {
            throw new LedgerError(LedgerErrorCode.InvalidValue, `Malformed ${call.operation} call`);
        }

        const current = this.state.current;
        const draft = createDraft(current);
        let result: R;
        let next: LedgerState;

        try {
            if (!isPrincipal(ctx.caller)) {
                throw new LedgerError(LedgerErrorCode.InvalidAddress, `Invalid caller '${ctx.caller}'`);
            }
            if (ctx.height < current.lastHeight) {
                throw new LedgerIntegrityError(`Clock regression: height ${ctx.height} after ${current.lastHeight}`);
            }

            result = run(draft);
            draft.version = current.version + 1;
            draft.lastHeight = ctx.height;
            next = finishDraft(draft);

            const verdict = checkInvariants(next);
            if (!verdict.ok) {
                console.error(`[Ledger] ${verdict.breach.message} (${verdict.breach.invariantId}) after ${call.operation}`);
                throw new LedgerIntegrityError(verdict.breach.message, verdict.breach.invariantId);
            }
        } catch (e: unknown) {
            this.reject(ctx, call, e);
            throw e;
        }

        const root = stateRoot(next);
        const evidenceId = this.recording
            ? this.audit.append({ call, context: ctx, status: 'SUCCESS', stateRoot: root }).evidenceId
            : `replay:${next.version}`;

        const snapshot = this.state.commit(next, root, evidenceId);
        this.lastCommit = { evidenceId, stateRoot: root, version: snapshot.version };
        return result;
    }

    private reject(ctx: CallContext, call: LedgerCall, e: unknown): void {
        if (!this.recording) return;

        if (e instanceof LedgerError) {
            const pressure = (this.rejectionTracker.get(e.code) ?? 0) + 1;
            this.rejectionTracker.set(e.code, pressure);
            if (pressure > this.config.pressureThreshold) {
                console.warn(`[Ledger] Pressure Alert: ${e.codeName} rejected ${pressure} times (last: ${call.operation} by ${ctx.caller})`);
            }
            this.audit.append({ call, context: ctx, status: 'REJECT', errorCode: e.code, reason: e.message });
            return;
        }

        const reason = e instanceof Error ? e.message : String(e);
        this.audit.append({ call, context: ctx, status: 'ABORTED', reason });
    }

    public getRejectionPressure(code: LedgerErrorCode): number {
        return this.rejectionTracker.get(code) ?? 0;
    }
}
