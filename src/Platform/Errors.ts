/**
 * Platform Error Translation
 * Maps kernel outcomes onto transport responses.
 */

import { ErrorCategory, LedgerError, LedgerIntegrityError } from '../ledger-core/Errors.js';

export interface ErrorResponse {
    status: number;
    body: { error: string; code?: number; message: string };
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    [ErrorCategory.AUTHORIZATION]: 403,
    [ErrorCategory.NOT_FOUND]: 404,
    [ErrorCategory.INVALID_INPUT]: 400,
    [ErrorCategory.STATE_CONFLICT]: 409,
    [ErrorCategory.STALE_DATA]: 409,
};

/**
 * A request the transport refused before it reached the kernel.
 */
export class RequestError extends Error {
    constructor(message: string) {
        super(`[Request] ${message}`);
        this.name = 'RequestError';
    }
}

export function translateError(e: unknown): ErrorResponse {
    if (e instanceof RequestError) {
        return { status: 400, body: { error: 'InvalidInput', message: e.message } };
    }
    if (e instanceof LedgerError) {
        return {
            status: STATUS_BY_CATEGORY[e.category],
            body: { error: e.codeName, code: e.code, message: e.message }
        };
    }
    if (e instanceof LedgerIntegrityError) {
        return { status: 500, body: { error: 'IntegrityBreach', message: e.message } };
    }
    const message = e instanceof Error ? e.message : 'Unknown Error';
    return { status: 500, body: { error: 'InfrastructureFailure', message } };
}
