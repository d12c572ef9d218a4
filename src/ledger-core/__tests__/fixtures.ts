import { LedgerKernel } from '../Kernel.js';
import { createLedgerConfig } from '../Config.js';
import type { LedgerConfigInput } from '../Config.js';
import { LedgerError } from '../Errors.js';
import type { LedgerErrorCode } from '../Errors.js';
import type { BlockHeight, CallContext, Principal } from '../L0/Primitives.js';
import { AuditLog } from '../L5/Audit.js';
import type { Evidence, IEventStore } from '../L5/Audit.js';

export const REGISTRAR = 'registrar';
export const ADMIN = 'kyc-admin';

export function createKernel(overrides: Omit<LedgerConfigInput, 'registrar'> = {}, audit?: AuditLog): LedgerKernel {
    const kernel = new LedgerKernel(createLedgerConfig({ registrar: REGISTRAR, admin: ADMIN, ...overrides }), audit);
    kernel.boot();
    return kernel;
}

export const at = (caller: Principal, height: BlockHeight): CallContext => ({ caller, height });

// Files an approved record valid for 1000 blocks
export function approve(kernel: LedgerKernel, address: Principal, height: BlockHeight, level: number = 1): void {
    kernel.setComplianceRecord(at(ADMIN, height), address, true, level, height + 1000);
}

/**
 * Runs a call expected to be rejected and returns its ledger error code.
 * Anything other than a LedgerError fails the test.
 */
export function rejectionCode(run: () => unknown): LedgerErrorCode | 'COMMITTED' {
    try {
        run();
    } catch (e: unknown) {
        if (e instanceof LedgerError) return e.code;
        throw e;
    }
    return 'COMMITTED';
}

/**
 * In-process event store for tests.
 */
export class MemoryEventStore implements IEventStore {
    public entries: Evidence[] = [];

    append(evidence: Evidence): void {
        this.entries.push(evidence);
    }

    getHistory(): Evidence[] {
        return [...this.entries];
    }

    getLatest(): Evidence | null {
        return this.entries[this.entries.length - 1] ?? null;
    }
}
