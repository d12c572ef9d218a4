// src/ledger-core/L0/Invariants.ts
import type { LedgerState } from '../L2/State.js';
import { readAsset } from '../L2/State.js';
import { SUPPLY_PER_ASSET } from './Primitives.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Supply Conservation")
    description: string;
    predicate: (state: LedgerState) => boolean;
}

export interface InvariantBreach {
    invariantId: string;
    boundary: string;
    message: string;
}

// I. Supply
export const INV_SUP_01: Invariant = {
    id: 'INV-SUP-01',
    boundary: 'Supply Conservation',
    description: 'Share balances of every asset sum to the fixed supply',
    predicate: (state) => {
        const totals = new Map<number, number>();
        for (const row of Object.values(state.balances)) {
            if (row.amount <= 0) return false;
            totals.set(row.assetId, (totals.get(row.assetId) ?? 0) + row.amount);
        }
        for (const asset of Object.values(state.assets)) {
            if (totals.get(asset.id) !== SUPPLY_PER_ASSET) return false;
            totals.delete(asset.id);
        }
        return totals.size === 0;
    }
};

// II. Revenue
export const INV_REV_01: Invariant = {
    id: 'INV-REV-01',
    boundary: 'Escrow Solvency',
    description: 'Accrued revenue equals escrow plus settled cash, escrow never negative',
    predicate: (state) => {
        let accrued = 0;
        for (const asset of Object.values(state.assets)) accrued += asset.accruedRevenue;

        let held = 0;
        for (const escrow of Object.values(state.escrow)) {
            if (escrow < 0) return false;
            held += escrow;
        }
        for (const cash of Object.values(state.cash)) held += cash;

        return accrued === held;
    }
};

export const INV_REV_02: Invariant = {
    id: 'INV-REV-02',
    boundary: 'Claim Monotonicity',
    description: 'No claim marker runs ahead of its asset accrual',
    predicate: (state) => Object.values(state.claims).every(claim => {
        const asset = readAsset(state, claim.assetId);
        return asset !== undefined && claim.lastClaimedAccrual <= asset.accruedRevenue;
    })
};

// III. Governance
export const INV_GOV_01: Invariant = {
    id: 'INV-GOV-01',
    boundary: 'Tally Consistency',
    description: 'Proposal tallies equal the sum of their vote records',
    predicate: (state) => {
        const tallies = new Map<number, { votesFor: number; votesAgainst: number }>();
        for (const vote of Object.values(state.votes)) {
            const tally = tallies.get(vote.proposalId) ?? { votesFor: 0, votesAgainst: 0 };
            if (vote.support) tally.votesFor += vote.weight;
            else tally.votesAgainst += vote.weight;
            tallies.set(vote.proposalId, tally);
        }
        return Object.values(state.proposals).every(p => {
            const tally = tallies.get(p.id) ?? { votesFor: 0, votesAgainst: 0 };
            return tally.votesFor === p.votesFor && tally.votesAgainst === p.votesAgainst;
        });
    }
};

// IV. Structure
export const INV_STR_01: Invariant = {
    id: 'INV-STR-01',
    boundary: 'Counter Consistency',
    description: 'Id counters equal the number of records they allocated',
    predicate: (state) =>
        Object.keys(state.assets).length === state.counters.asset
        && Object.keys(state.proposals).length === state.counters.proposal
};

export const LEDGER_INVARIANTS: Invariant[] = [
    INV_SUP_01,
    INV_REV_01, INV_REV_02,
    INV_GOV_01,
    INV_STR_01
];

export function checkInvariants(state: LedgerState): { ok: true } | { ok: false; breach: InvariantBreach } {
    for (const inv of LEDGER_INVARIANTS) {
        if (!inv.predicate(state)) {
            return {
                ok: false,
                breach: {
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
