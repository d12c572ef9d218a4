/**
 * Ledger Error Taxonomy
 * Stable, numbered codes surfaced verbatim to callers on a rejected call.
 */

export enum LedgerErrorCode {
    OwnerOnly = 100,
    NotFound = 101,
    AlreadyListed = 102,
    InvalidAmount = 103,
    NotAuthorized = 104,
    KycRequired = 105,
    VoteExists = 106,
    VoteEnded = 107,
    PriceExpired = 108,
    InvalidURI = 109,
    InvalidValue = 110,
    InvalidDuration = 111,
    InvalidKycLevel = 112,
    InvalidExpiry = 113,
    InvalidVotes = 114,
    InvalidAddress = 115,
    InvalidTitle = 116,
    AlreadyExecuted = 117,
    VotingOpen = 118,
}

export enum ErrorCategory {
    AUTHORIZATION = 'AUTHORIZATION',
    NOT_FOUND = 'NOT_FOUND',
    INVALID_INPUT = 'INVALID_INPUT',
    STATE_CONFLICT = 'STATE_CONFLICT',
    STALE_DATA = 'STALE_DATA',
}

export const ERROR_CATEGORY: Record<LedgerErrorCode, ErrorCategory> = {
    // I. Authorization
    [LedgerErrorCode.OwnerOnly]: ErrorCategory.AUTHORIZATION,
    [LedgerErrorCode.NotAuthorized]: ErrorCategory.AUTHORIZATION,
    [LedgerErrorCode.KycRequired]: ErrorCategory.AUTHORIZATION,

    // II. Lookup
    [LedgerErrorCode.NotFound]: ErrorCategory.NOT_FOUND,

    // III. Arguments
    [LedgerErrorCode.InvalidAmount]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidURI]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidValue]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidDuration]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidKycLevel]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidExpiry]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidVotes]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidAddress]: ErrorCategory.INVALID_INPUT,
    [LedgerErrorCode.InvalidTitle]: ErrorCategory.INVALID_INPUT,

    // IV. Lifecycle conflicts
    [LedgerErrorCode.AlreadyListed]: ErrorCategory.STATE_CONFLICT,
    [LedgerErrorCode.VoteExists]: ErrorCategory.STATE_CONFLICT,
    [LedgerErrorCode.VoteEnded]: ErrorCategory.STATE_CONFLICT,
    [LedgerErrorCode.AlreadyExecuted]: ErrorCategory.STATE_CONFLICT,
    [LedgerErrorCode.VotingOpen]: ErrorCategory.STATE_CONFLICT,

    // V. Freshness
    [LedgerErrorCode.PriceExpired]: ErrorCategory.STALE_DATA,
};

export class LedgerError extends Error {
    constructor(
        public readonly code: LedgerErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Ledger:${LedgerErrorCode[code]}] ${message}`);
        this.name = 'LedgerError';
    }

    public get codeName(): string { return LedgerErrorCode[this.code]; }
    public get category(): ErrorCategory { return ERROR_CATEGORY[this.code]; }
}

/**
 * Raised when a committed state would break a ledger invariant or the
 * environment hands the kernel a call it cannot order. Never a caller error.
 */
export class LedgerIntegrityError extends Error {
    constructor(message: string, public readonly invariantId?: string) {
        super(`[Ledger:INTEGRITY] ${message}`);
        this.name = 'LedgerIntegrityError';
    }
}
