import { describe, test, expect, beforeEach } from '@jest/globals';
import { LedgerErrorCode } from '../../Errors.js';
import { LedgerKernel } from '../../Kernel.js';
import { PROPOSAL_MIN_STAKE, proposalStatus } from '../Governance.js';
import { REGISTRAR, approve, at, createKernel, rejectionCode } from '../../__tests__/fixtures.js';

describe('Governance Engine', () => {
    let kernel: LedgerKernel;

    // registrar 50001, alice 30000, bob 10000, carol 9999
    beforeEach(() => {
        kernel = createKernel();
        kernel.tokenizeAsset(at(REGISTRAR, 1), 'ipfs://x', 5000);
        for (const holder of [REGISTRAR, 'alice', 'bob', 'carol']) approve(kernel, holder, 1);
        kernel.transferShares(at(REGISTRAR, 2), 1, 'alice', 30000);
        kernel.transferShares(at(REGISTRAR, 2), 1, 'bob', PROPOSAL_MIN_STAKE);
        kernel.transferShares(at(REGISTRAR, 2), 1, 'carol', PROPOSAL_MIN_STAKE - 1);
    });

    describe('initiateProposal', () => {
        test('opens a proposal for duration blocks', () => {
            expect(kernel.initiateProposal(at('bob', 10), 1, 'Raise rent', 50, 20000)).toBe(1);
            expect(kernel.getProposalDetails(1)).toEqual({
                id: 1,
                assetId: 1,
                proposer: 'bob',
                title: 'Raise rent',
                startHeight: 10,
                endHeight: 60,
                executed: false,
                passed: false,
                votesFor: 0,
                votesAgainst: 0,
                minimumThreshold: 20000
            });
            expect(kernel.initiateProposal(at(REGISTRAR, 10), 1, 'Repaint', 12, 1)).toBe(2);
        });

        test('checks asset, duration, threshold, title and stake in that order', () => {
            const propose = (assetId: number, title: string, duration: number, threshold: number, caller: string = REGISTRAR) =>
                rejectionCode(() => kernel.initiateProposal(at(caller, 10), assetId, title, duration, threshold));

            expect(propose(9, '', 0, 0)).toBe(LedgerErrorCode.NotFound);
            expect(propose(1, '', 11, 0, 'carol')).toBe(LedgerErrorCode.InvalidDuration);
            expect(propose(1, 'Raise rent', 145, 20000)).toBe(LedgerErrorCode.InvalidDuration);
            expect(propose(1, '', 12, 0, 'carol')).toBe(LedgerErrorCode.InvalidVotes);
            expect(propose(1, 'Raise rent', 12, 100001)).toBe(LedgerErrorCode.InvalidVotes);
            expect(propose(1, '', 144, 100000, 'carol')).toBe(LedgerErrorCode.InvalidTitle);
            expect(propose(1, 't'.repeat(257), 144, 100000)).toBe(LedgerErrorCode.InvalidTitle);
            expect(propose(1, 'Raise rent', 144, 100000, 'carol')).toBe(LedgerErrorCode.NotAuthorized);
            expect(kernel.State.counters.proposal).toBe(0);
        });
    });

    describe('castVote', () => {
        beforeEach(() => {
            kernel.initiateProposal(at(REGISTRAR, 10), 1, 'Raise rent', 50, 20000);
        });

        test('records share-weighted votes on both sides', () => {
            kernel.castVote(at('alice', 11), 1, true, 25000);
            kernel.castVote(at('bob', 12), 1, false, 10000);
            kernel.castVote(at(REGISTRAR, 13), 1, false, 1);

            const proposal = kernel.getProposalDetails(1);
            expect(proposal?.votesFor).toBe(25000);
            expect(proposal?.votesAgainst).toBe(10001);
            expect(kernel.getVoteRecord(1, 'alice')).toEqual({ proposalId: 1, voter: 'alice', support: true, weight: 25000, castAt: 11 });
            expect(kernel.getVoteRecord(1, 'carol')).toBeUndefined();
        });

        test('weight is captured when the vote is cast', () => {
            kernel.castVote(at('alice', 11), 1, true, 20000);
            kernel.transferShares(at('alice', 12), 1, 'bob', 10000);

            expect(kernel.getVoteRecord(1, 'alice')?.weight).toBe(20000);
            expect(kernel.getProposalDetails(1)?.votesFor).toBe(20000);
            kernel.castVote(at('bob', 13), 1, true, 20000);
            expect(kernel.getProposalDetails(1)?.votesFor).toBe(40000);
        });

        test('cast weight cannot move while the proposal is open', () => {
            kernel.castVote(at('alice', 11), 1, true, 30000);

            expect(rejectionCode(() => kernel.transferShares(at('alice', 12), 1, 'bob', 1))).toBe(LedgerErrorCode.InvalidAmount);
            kernel.castVote(at('bob', 13), 1, true, 10000);
            expect(rejectionCode(() => kernel.transferShares(at('bob', 14), 1, 'carol', 1))).toBe(LedgerErrorCode.InvalidAmount);

            // Tally equals the shares alice and bob hold
            expect(kernel.getProposalDetails(1)?.votesFor).toBe(40000);
            expect(rejectionCode(() => kernel.castVote(at('carol', 15), 1, true, 10000))).toBe(LedgerErrorCode.InvalidAmount);

            // Released once voting closes
            kernel.transferShares(at('alice', 60), 1, 'carol', 30000);
            expect(kernel.getShareBalance('carol', 1)).toBe(39999);
        });

        test('only the weight cast is locked, on that asset only', () => {
            kernel.castVote(at('alice', 11), 1, true, 5000);
            kernel.transferShares(at('alice', 12), 1, 'bob', 25000);
            expect(rejectionCode(() => kernel.transferShares(at('alice', 13), 1, 'bob', 1))).toBe(LedgerErrorCode.InvalidAmount);

            kernel.tokenizeAsset(at(REGISTRAR, 14), 'ipfs://y', 5000);
            kernel.transferShares(at(REGISTRAR, 15), 2, 'alice', 100);
            kernel.transferShares(at('alice', 16), 2, 'bob', 100);
            expect(kernel.getShareBalance('bob', 2)).toBe(100);
        });

        test('rejects bad votes', () => {
            expect(rejectionCode(() => kernel.castVote(at('alice', 11), 2, true, 1))).toBe(LedgerErrorCode.NotFound);
            expect(rejectionCode(() => kernel.castVote(at('alice', 11), 1, true, 0))).toBe(LedgerErrorCode.InvalidVotes);
            expect(rejectionCode(() => kernel.castVote(at('alice', 11), 1, true, 100001))).toBe(LedgerErrorCode.InvalidVotes);
            expect(rejectionCode(() => kernel.castVote(at('alice', 11), 1, true, 30001))).toBe(LedgerErrorCode.InvalidAmount);
            expect(rejectionCode(() => kernel.castVote(at('dave', 11), 1, true, 1))).toBe(LedgerErrorCode.KycRequired);
            expect(kernel.getProposalDetails(1)?.votesFor).toBe(0);
        });

        test('voting closes at the end height', () => {
            kernel.castVote(at('alice', 59), 1, true, 100);

            expect(rejectionCode(() => kernel.castVote(at('bob', 60), 1, true, 100))).toBe(LedgerErrorCode.VoteEnded);
            // A closed proposal reports VoteEnded before VoteExists
            expect(rejectionCode(() => kernel.castVote(at('alice', 60), 1, true, 100))).toBe(LedgerErrorCode.VoteEnded);
            expect(kernel.getProposalDetails(1)?.votesFor).toBe(100);
        });
    });

    describe('finalize', () => {
        beforeEach(() => {
            kernel.initiateProposal(at(REGISTRAR, 10), 1, 'Raise rent', 50, 30000);
        });

        test('is refused while voting is open', () => {
            expect(rejectionCode(() => kernel.finalize(at(REGISTRAR, 59), 1))).toBe(LedgerErrorCode.VotingOpen);
            expect(kernel.getProposalStatus(1, 59)).toBe('OPEN');
            expect(kernel.getProposalStatus(1, 60)).toBe('CLOSED');
        });

        test('passes when votes for reach the threshold exactly', () => {
            kernel.castVote(at('alice', 11), 1, true, 30000);
            kernel.castVote(at(REGISTRAR, 11), 1, false, 50000);

            expect(kernel.finalize(at('bob', 60), 1)).toBe(true);
            expect(kernel.getProposalDetails(1)).toMatchObject({ executed: true, passed: true });
            expect(kernel.getProposalStatus(1, 61)).toBe('FINALIZED');
        });

        test('fails one vote short of the threshold', () => {
            kernel.castVote(at('alice', 11), 1, true, 29999);

            expect(kernel.finalize(at('bob', 70), 1)).toBe(false);
            expect(kernel.getProposalDetails(1)).toMatchObject({ executed: true, passed: false });
        });

        test('happens exactly once', () => {
            kernel.finalize(at(REGISTRAR, 60), 1);

            expect(rejectionCode(() => kernel.finalize(at(REGISTRAR, 61), 1))).toBe(LedgerErrorCode.AlreadyExecuted);
            expect(rejectionCode(() => kernel.finalize(at(REGISTRAR, 61), 5))).toBe(LedgerErrorCode.NotFound);
        });
    });

    test('status is derived from height and execution', () => {
        const proposal = {
            id: 1, assetId: 1, proposer: 'bob', title: 't', startHeight: 0, endHeight: 12,
            executed: false, passed: false, votesFor: 0, votesAgainst: 0, minimumThreshold: 1
        };
        expect(proposalStatus(proposal, 11)).toBe('OPEN');
        expect(proposalStatus(proposal, 12)).toBe('CLOSED');
        expect(proposalStatus({ ...proposal, executed: true }, 3)).toBe('FINALIZED');
        expect(kernel.getProposalStatus(4, 3)).toBeUndefined();
    });
});
