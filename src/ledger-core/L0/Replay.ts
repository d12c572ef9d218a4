import { LedgerKernel } from '../Kernel.js';
import { AuditLog } from '../L5/Audit.js';

export class ReplayEngine {
    /**
     * Rebuilds ledger state by re-executing every committed call in the
     * provided AuditLog. The kernel must be fresh: genesis state, no commits.
     */
    public replay(log: AuditLog, kernel: LedgerKernel): number {
        if (kernel.State.version !== 0) {
            throw new Error('Replay Failure: kernel already holds committed state');
        }

        const history = log.getHistory();
        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        kernel.boot();
        let restored = 0;
        for (const entry of history) {
            if (entry.status !== 'SUCCESS') continue;
            try {
                kernel.restore(entry);
                restored++;
            } catch (e: unknown) {
                const reason = e instanceof Error ? e.message : String(e);
                throw new Error(`Replay Failure at ${entry.evidenceId} (${entry.call.operation}): ${reason}`);
            }
        }

        const tip = log.getTip();
        if (tip?.status === 'SUCCESS' && tip.stateRoot !== kernel.StateRoot) {
            console.warn(`[ReplayEngine] Tip mismatch. Kernel: ${kernel.StateRoot}, Log: ${tip.stateRoot}`);
        }

        console.log(`[ReplayEngine] Replay complete: ${restored} calls restored.`);
        return restored;
    }
}
