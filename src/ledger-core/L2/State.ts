import type { AssetID, BlockHeight, Principal, ProposalID } from '../L0/Primitives.js';
import { assetKey, claimKey, shareKey, voteKey } from '../L0/Primitives.js';
import { GENESIS_HASH, canonicalize, hash } from '../L0/Crypto.js';

// --- Records ---
export interface Asset {
    id: AssetID;
    owner: Principal;
    metadataURI: string;
    value: number;
    locked: boolean;
    createdAt: BlockHeight;
    lastPriceUpdateAt: BlockHeight;
    accruedRevenue: number;
}

export interface ShareBalance {
    holder: Principal;
    assetId: AssetID;
    amount: number;
}

export interface ComplianceRecord {
    address: Principal;
    approved: boolean;
    level: number;
    expiresAt: BlockHeight;
}

export interface Proposal {
    id: ProposalID;
    assetId: AssetID;
    proposer: Principal;
    title: string;
    startHeight: BlockHeight;
    endHeight: BlockHeight;
    executed: boolean;
    passed: boolean;
    votesFor: number;
    votesAgainst: number;
    minimumThreshold: number;
}

export interface VoteRecord {
    proposalId: ProposalID;
    voter: Principal;
    support: boolean;
    weight: number;
    castAt: BlockHeight;
}

export interface DividendClaim {
    assetId: AssetID;
    beneficiary: Principal;
    lastClaimedAccrual: number;
}

export interface MarketPrice {
    assetId: AssetID;
    price: number;
    decimals: number;
    lastUpdatedAt: BlockHeight;
    oracleAddress: Principal;
}

// --- Ledger State ---
export interface LedgerState {
    counters: { asset: number; proposal: number };
    assets: Record<string, Asset>;
    balances: Record<string, ShareBalance>;
    compliance: Record<string, ComplianceRecord>;
    proposals: Record<string, Proposal>;
    votes: Record<string, VoteRecord>;
    claims: Record<string, DividendClaim>;
    prices: Record<string, MarketPrice>;
    oracles: Record<string, Principal>;
    escrow: Record<string, number>;
    cash: Record<string, number>;
    version: number;
    lastHeight: BlockHeight;
}

export function genesisState(): LedgerState {
    return {
        counters: { asset: 0, proposal: 0 },
        assets: {},
        balances: {},
        compliance: {},
        proposals: {},
        votes: {},
        claims: {},
        prices: {},
        oracles: {},
        escrow: {},
        cash: {},
        version: 0,
        lastHeight: 0,
    };
}

// Own-property lookup: a key never resolves through Object.prototype
export function lookup<T>(table: Record<string, T>, key: string): T | undefined {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

// --- Readers (shared by every engine) ---
export const readAsset = (state: LedgerState, assetId: AssetID): Asset | undefined =>
    lookup(state.assets, assetKey(assetId));

export const readBalance = (state: LedgerState, holder: Principal, assetId: AssetID): number =>
    lookup(state.balances, shareKey(holder, assetId))?.amount ?? 0;

export const readProposal = (state: LedgerState, proposalId: ProposalID): Proposal | undefined =>
    lookup(state.proposals, String(proposalId));

export const readVote = (state: LedgerState, proposalId: ProposalID, voter: Principal): VoteRecord | undefined =>
    lookup(state.votes, voteKey(proposalId, voter));

export const readClaim = (state: LedgerState, assetId: AssetID, beneficiary: Principal): number =>
    lookup(state.claims, claimKey(assetId, beneficiary))?.lastClaimedAccrual ?? 0;

export const readCash = (state: LedgerState, holder: Principal): number =>
    lookup(state.cash, holder) ?? 0;

export const readEscrow = (state: LedgerState, assetId: AssetID): number =>
    lookup(state.escrow, assetKey(assetId)) ?? 0;

// Writes a balance, dropping the row once it reaches zero
export function writeBalance(state: LedgerState, holder: Principal, assetId: AssetID, amount: number): void {
    const key = shareKey(holder, assetId);
    if (amount === 0) {
        delete state.balances[key];
        return;
    }
    state.balances[key] = { holder, assetId, amount };
}

// --- Snapshot chain ---
export interface StateSnapshot {
    version: number;
    stateRoot: string;
    hash: string;
    previousHash: string;
    evidenceId: string;
    height: BlockHeight;
}

export function stateRoot(state: LedgerState): string {
    return hash(canonicalize(state));
}

/**
 * Holds the committed ledger state and the hash chain of its snapshots.
 * Only the kernel publishes a new state, one snapshot per committed call.
 */
export class StateModel {
    private currentState: LedgerState = genesisState();
    private snapshots: StateSnapshot[] = [];

    constructor() {
        this.snapshots.push({
            version: 0,
            stateRoot: stateRoot(this.currentState),
            hash: hash('GENESIS'),
            previousHash: GENESIS_HASH,
            evidenceId: 'genesis',
            height: 0
        });
    }

    public get current(): LedgerState { return this.currentState; }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    public get tip(): StateSnapshot {
        const last = this.snapshots[this.snapshots.length - 1];
        if (!last) throw new Error('Critical: Genesis Snapshot Missing');
        return last;
    }

    public commit(next: LedgerState, root: string, evidenceId: string): StateSnapshot {
        const previous = this.tip;
        const snapshot: StateSnapshot = {
            version: next.version,
            stateRoot: root,
            hash: StateModel.snapshotHash(next.version, root, evidenceId, next.lastHeight, previous.hash),
            previousHash: previous.hash,
            evidenceId,
            height: next.lastHeight
        };
        this.snapshots.push(snapshot);
        this.currentState = next;
        return snapshot;
    }

    public verifyIntegrity(): boolean {
        for (let i = 1; i < this.snapshots.length; i++) {
            const prev = this.snapshots[i - 1];
            const curr = this.snapshots[i];
            if (!prev || !curr) return false;
            if (curr.previousHash !== prev.hash) return false;

            const expected = StateModel.snapshotHash(curr.version, curr.stateRoot, curr.evidenceId, curr.height, curr.previousHash);
            if (expected !== curr.hash) return false;
        }
        return this.tip.stateRoot === stateRoot(this.currentState);
    }

    private static snapshotHash(version: number, root: string, evidenceId: string, height: BlockHeight, previousHash: string): string {
        const canonical: [number, string, string, number, string] = [version, root, evidenceId, height, previousHash];
        return hash(canonicalize(canonical));
    }
}
