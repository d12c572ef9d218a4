import { z } from 'zod';

/**
 * Wire shape of every mutating call. The audit log records calls in this form
 * and replay feeds them back through the same kernel entry points.
 */
const id = z.number().finite();
const amount = z.number().finite();
const principal = z.string();

export const callContextSchema = z.object({
    caller: principal,
    height: z.number().int().nonnegative()
});

export const ledgerCallSchema = z.discriminatedUnion('operation', [
    z.object({ operation: z.literal('tokenizeAsset'), args: z.tuple([z.string(), amount]) }),
    z.object({ operation: z.literal('transferShares'), args: z.tuple([id, principal, amount]) }),
    z.object({ operation: z.literal('setAssetLock'), args: z.tuple([id, z.boolean()]) }),
    z.object({ operation: z.literal('depositRevenue'), args: z.tuple([id, amount]) }),
    z.object({ operation: z.literal('setComplianceRecord'), args: z.tuple([principal, z.boolean(), amount, amount]) }),
    z.object({ operation: z.literal('revokeCompliance'), args: z.tuple([principal]) }),
    z.object({ operation: z.literal('initiateProposal'), args: z.tuple([id, z.string(), amount, amount]) }),
    z.object({ operation: z.literal('castVote'), args: z.tuple([id, z.boolean(), amount]) }),
    z.object({ operation: z.literal('finalize'), args: z.tuple([id]) }),
    z.object({ operation: z.literal('harvestDividends'), args: z.tuple([id]) }),
    z.object({ operation: z.literal('registerOracle'), args: z.tuple([id, principal]) }),
    z.object({ operation: z.literal('setPrice'), args: z.tuple([id, amount, amount]) })
]);

export type LedgerCall = z.infer<typeof ledgerCallSchema>;
export type LedgerOperation = LedgerCall['operation'];
