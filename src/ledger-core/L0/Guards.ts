// src/ledger-core/L0/Guards.ts
import { LedgerError, LedgerErrorCode } from '../Errors.js';
import type { BlockHeight, Principal } from './Primitives.js';
import { MAX_TEXT_LENGTH, isPrincipal } from './Primitives.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: LedgerErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: LedgerErrorCode, msg: string, details?: Record<string, unknown>): GuardResult =>
    ({ ok: false, code, violation: msg, ...(details ? { details } : {}) });

/**
 * Aborts the current call with the first failing guard.
 */
export function enforce(...results: GuardResult[]): void {
    for (const result of results) {
        if (!result.ok) throw new LedgerError(result.code, result.violation, result.details);
    }
}

/**
 * Existence check that narrows: returns the record or aborts with NotFound.
 */
export function required<T>(found: T | undefined, what: string): T {
    if (found === undefined) throw new LedgerError(LedgerErrorCode.NotFound, `${what} not found`);
    return found;
}

// --- Concrete Guards ---

// 1. Privileged principal (registrar, compliance admin, asset owner)
export const PrincipalMatchGuard: Guard<{ actor: Principal, expected: Principal, code: LedgerErrorCode, role: string }> =
    ({ actor, expected, code, role }) => {
        if (actor !== expected) return FAIL(code, `${actor} is not the ${role}`, { actor, role });
        return OK;
    };

// 2. Address well-formedness
export const AddressGuard: Guard<{ address: string }> = ({ address }) => {
    if (!isPrincipal(address)) return FAIL(LedgerErrorCode.InvalidAddress, `Invalid principal '${address}'`);
    return OK;
};

// 3. Bounded text (URIs, titles)
export const TextGuard: Guard<{ text: string, code: LedgerErrorCode, max?: number }> = ({ text, code, max = MAX_TEXT_LENGTH }) => {
    if (text.length < 1 || text.length > max) {
        return FAIL(code, `Text length ${text.length} outside 1..${max}`, { length: text.length });
    }
    return OK;
};

// 4. Integer range, inclusive at both ends
export const RangeGuard: Guard<{ value: number, min: number, max: number, code: LedgerErrorCode, label: string }> =
    ({ value, min, max, code, label }) => {
        if (!Number.isSafeInteger(value) || value < min || value > max) {
            return FAIL(code, `${label} ${value} outside ${min}..${max}`, { value, min, max });
        }
        return OK;
    };

// 5. Freshness of a height-stamped record
export const FreshnessGuard: Guard<{ updatedAt: BlockHeight, height: BlockHeight, maxStaleness: number }> =
    ({ updatedAt, height, maxStaleness }) => {
        const age = height - updatedAt;
        if (age > maxStaleness) {
            return FAIL(LedgerErrorCode.PriceExpired, `Price is ${age} blocks old, limit ${maxStaleness}`, { age, maxStaleness });
        }
        return OK;
    };
