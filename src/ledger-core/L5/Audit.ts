// src/ledger-core/L5/Audit.ts
import { GENESIS_HASH, canonicalize, hash } from '../L0/Crypto.js';
import type { LedgerCall } from '../L0/Calls.js';
import type { CallContext } from '../L0/Primitives.js';
import type { LedgerErrorCode } from '../Errors.js';

/**
 * Event Store Port.
 * Synchronous: a call is not finished until its evidence is durable.
 */
export interface IEventStore {
    append(evidence: Evidence): void;
    getHistory(): Evidence[];
    getLatest(): Evidence | null;
}

export type EvidenceStatus = 'SUCCESS' | 'REJECT' | 'ABORTED';

// --- Evidence (one per call, committed or not) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    call: LedgerCall;
    context: CallContext;
    status: EvidenceStatus;
    stateRoot?: string; // Root after commit, SUCCESS only
    errorCode?: LedgerErrorCode;
    reason?: string;
}

export interface EvidenceInput {
    call: LedgerCall;
    context: CallContext;
    status: EvidenceStatus;
    stateRoot?: string;
    errorCode?: LedgerErrorCode;
    reason?: string;
}

export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public append(input: EvidenceInput): Evidence {
        const latest = this.getTip();
        const previousEvidenceId = latest ? latest.evidenceId : GENESIS_HASH;

        const evidence: Evidence = {
            evidenceId: AuditLog.calculateHash(previousEvidenceId, input),
            previousEvidenceId,
            call: input.call,
            context: input.context,
            status: input.status,
            ...(input.stateRoot !== undefined ? { stateRoot: input.stateRoot } : {}),
            ...(input.errorCode !== undefined ? { errorCode: input.errorCode } : {}),
            ...(input.reason !== undefined ? { reason: input.reason } : {})
        };

        Object.freeze(evidence);

        // Store first: a failed write leaves the local chain untouched
        this.store?.append(evidence);
        this.localChain.push(evidence);
        return evidence;
    }

    public getHistory(): Evidence[] {
        if (this.store) return this.store.getHistory();
        return [...this.localChain];
    }

    public verifyChain(): boolean {
        let prev = GENESIS_HASH;
        for (const entry of this.getHistory()) {
            if (entry.previousEvidenceId !== prev) return false;
            if (AuditLog.calculateHash(prev, entry) !== entry.evidenceId) return false;
            prev = entry.evidenceId;
        }
        return true;
    }

    public getTip(): Evidence | null {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        return this.store?.getLatest() ?? null;
    }

    private static calculateHash(previousEvidenceId: string, input: EvidenceInput): string {
        // [PreviousHash, Call, Context, Status, StateRoot, ErrorCode, Reason]
        const canonical: [string, LedgerCall, CallContext, EvidenceStatus, string, number, string] = [
            previousEvidenceId,
            input.call,
            input.context,
            input.status,
            input.stateRoot ?? '',
            input.errorCode ?? 0,
            input.reason ?? ''
        ];
        return hash(canonicalize(canonical));
    }
}
