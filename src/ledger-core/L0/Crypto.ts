// src/ledger-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// SHA-256, hex encoded
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted at every depth, `undefined` members
 * dropped. Two structurally equal values always canonicalize identically.
 */
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(sortKeys);
    if (value !== null && typeof value === 'object') {
        const entries: [string, unknown][] = [];
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) entries.push([key, sortKeys(member)]);
        }
        return Object.fromEntries(entries);
    }
    return value;
}
