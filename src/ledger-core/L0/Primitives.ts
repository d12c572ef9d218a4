/**
 * LEDGER PRIMITIVES
 * Identifiers, call context and the persisted-config constants.
 */

export type Principal = string;
export type AssetID = number;
export type ProposalID = number;
export type BlockHeight = number;

/**
 * Supplied by the execution environment for every call. Caller and height are
 * never read from ambient state.
 */
export interface CallContext {
    caller: Principal;
    height: BlockHeight;
}

// --- Persisted-config surface ---
export const SUPPLY_PER_ASSET = 100000;
export const MIN_VALUE = 1000;
export const MAX_VALUE = 1_000_000_000_000;
export const MIN_DURATION = 12;
export const MAX_DURATION = 144;
export const MAX_KYC_LEVEL = 5;
export const MAX_EXPIRY_BLOCKS = 52560;
export const MAX_TEXT_LENGTH = 256;
export const MAX_PRICE_DECIMALS = 18;
export const PROPOSAL_OWNERSHIP_DIVISOR = 10;
export const MAX_PRINCIPAL_LENGTH = 128;

// Keys that would reach Object.prototype when used as a record key
const RESERVED_KEYS = ['__proto__', 'prototype', 'constructor'];

export function isPrincipal(value: string): boolean {
    return value.length > 0
        && value.length <= MAX_PRINCIPAL_LENGTH
        && value.trim() === value
        && !RESERVED_KEYS.includes(value);
}

export function isCount(value: number): boolean {
    return Number.isSafeInteger(value) && value >= 0;
}

// --- Composite table keys ---
export const assetKey = (assetId: AssetID): string => String(assetId);
export const shareKey = (holder: Principal, assetId: AssetID): string => `${holder}|${assetId}`;
export const voteKey = (proposalId: ProposalID, voter: Principal): string => `${proposalId}|${voter}`;
export const claimKey = (assetId: AssetID, beneficiary: Principal): string => `${assetId}|${beneficiary}`;
