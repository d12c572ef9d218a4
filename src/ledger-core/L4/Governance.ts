import type { LedgerConfig } from '../Config.js';
import { LedgerErrorCode } from '../Errors.js';
import type { AssetID, BlockHeight, CallContext, Principal, ProposalID } from '../L0/Primitives.js';
import {
    MAX_DURATION,
    MIN_DURATION,
    PROPOSAL_OWNERSHIP_DIVISOR,
    SUPPLY_PER_ASSET,
    voteKey
} from '../L0/Primitives.js';
import { RangeGuard, TextGuard, enforce, required } from '../L0/Guards.js';
import type { GuardResult } from '../L0/Guards.js';
import { ComplianceGate } from '../L1/Compliance.js';
import type { LedgerState, Proposal, VoteRecord } from '../L2/State.js';
import type { VoteLock } from '../L3/Registry.js';
import { readAsset, readBalance, readProposal, readVote } from '../L2/State.js';

export type ProposalStatus = 'OPEN' | 'CLOSED' | 'FINALIZED';

export const PROPOSAL_MIN_STAKE = SUPPLY_PER_ASSET / PROPOSAL_OWNERSHIP_DIVISOR;

/**
 * Open while height < endHeight, Closed from endHeight until finalized.
 */
export function proposalStatus(proposal: Proposal, height: BlockHeight): ProposalStatus {
    if (proposal.executed) return 'FINALIZED';
    return height < proposal.endHeight ? 'OPEN' : 'CLOSED';
}

const check = (ok: boolean, code: LedgerErrorCode, violation: string): GuardResult =>
    ok ? { ok: true } : { ok: false, code, violation };

/**
 * Governance Engine.
 * Share-weighted voting with weight captured at cast time. Cast weight stays
 * with the voter until the proposal closes, so a share counts once per
 * proposal.
 */
export class GovernanceEngine implements VoteLock {
    constructor(
        private config: LedgerConfig,
        private compliance: ComplianceGate
    ) { }

    public initiateProposal(
        state: LedgerState,
        ctx: CallContext,
        assetId: AssetID,
        title: string,
        duration: number,
        minimumThreshold: number
    ): ProposalID {
        // An unknown asset is NotFound, like every other lookup by id
        required(readAsset(state, assetId), `Asset ${assetId}`);
        const stake = readBalance(state, ctx.caller, assetId);

        enforce(
            RangeGuard({ value: duration, min: MIN_DURATION, max: MAX_DURATION, code: LedgerErrorCode.InvalidDuration, label: 'Duration' }),
            RangeGuard({ value: minimumThreshold, min: 1, max: SUPPLY_PER_ASSET, code: LedgerErrorCode.InvalidVotes, label: 'Minimum threshold' }),
            TextGuard({ text: title, code: LedgerErrorCode.InvalidTitle }),
            check(stake >= PROPOSAL_MIN_STAKE, LedgerErrorCode.NotAuthorized,
                `${ctx.caller} holds ${stake} shares, ${PROPOSAL_MIN_STAKE} required to propose`)
        );

        const proposalId = state.counters.proposal + 1;
        state.counters.proposal = proposalId;

        state.proposals[String(proposalId)] = {
            id: proposalId,
            assetId,
            proposer: ctx.caller,
            title,
            startHeight: ctx.height,
            endHeight: ctx.height + duration,
            executed: false,
            passed: false,
            votesFor: 0,
            votesAgainst: 0,
            minimumThreshold
        };
        return proposalId;
    }

    public castVote(state: LedgerState, ctx: CallContext, proposalId: ProposalID, support: boolean, weight: number): void {
        const proposal = required(readProposal(state, proposalId), `Proposal ${proposalId}`);
        const balance = readBalance(state, ctx.caller, proposal.assetId);

        enforce(
            check(proposalStatus(proposal, ctx.height) === 'OPEN', LedgerErrorCode.VoteEnded,
                `Voting on proposal ${proposalId} ended at height ${proposal.endHeight}`),
            check(readVote(state, proposalId, ctx.caller) === undefined, LedgerErrorCode.VoteExists,
                `${ctx.caller} already voted on proposal ${proposalId}`),
            this.compliance.guard({ state, address: ctx.caller, requiredLevel: this.config.compliance.castVote, height: ctx.height }),
            RangeGuard({ value: weight, min: 1, max: SUPPLY_PER_ASSET, code: LedgerErrorCode.InvalidVotes, label: 'Vote weight' }),
            check(weight <= balance, LedgerErrorCode.InvalidAmount, `Vote weight ${weight} exceeds balance ${balance}`)
        );

        state.votes[voteKey(proposalId, ctx.caller)] = {
            proposalId,
            voter: ctx.caller,
            support,
            weight,
            castAt: ctx.height
        };
        if (support) proposal.votesFor += weight;
        else proposal.votesAgainst += weight;
    }

    /**
     * Terminal transition. Passes when votesFor >= minimumThreshold: the
     * threshold is inclusive and a tie with it passes.
     */
    public finalize(state: LedgerState, ctx: CallContext, proposalId: ProposalID): boolean {
        const proposal = required(readProposal(state, proposalId), `Proposal ${proposalId}`);

        enforce(
            check(!proposal.executed, LedgerErrorCode.AlreadyExecuted, `Proposal ${proposalId} already finalized`),
            check(ctx.height >= proposal.endHeight, LedgerErrorCode.VotingOpen,
                `Proposal ${proposalId} is open until height ${proposal.endHeight}`)
        );

        proposal.executed = true;
        proposal.passed = proposal.votesFor >= proposal.minimumThreshold;
        return proposal.passed;
    }

    public lockedShares(state: LedgerState, assetId: AssetID, holder: Principal, height: BlockHeight): number {
        let locked = 0;
        for (const proposal of Object.values(state.proposals)) {
            if (proposal.assetId !== assetId || proposalStatus(proposal, height) !== 'OPEN') continue;
            const vote = readVote(state, proposal.id, holder);
            if (vote) locked = Math.max(locked, vote.weight);
        }
        return locked;
    }

    public getProposalDetails(state: LedgerState, proposalId: ProposalID): Proposal | undefined {
        return readProposal(state, proposalId);
    }

    public getProposalStatus(state: LedgerState, proposalId: ProposalID, height: BlockHeight): ProposalStatus | undefined {
        const proposal = readProposal(state, proposalId);
        return proposal ? proposalStatus(proposal, height) : undefined;
    }

    public getVoteRecord(state: LedgerState, proposalId: ProposalID, voter: Principal): VoteRecord | undefined {
        return readVote(state, proposalId, voter);
    }
}
