/**
 * Market error taxonomy.
 *
 * Every failure aborts the whole call after rollback; callers inspect `code`
 * to decide whether to resubmit (fresh signatures, new deadline, etc).
 */

export type LifecycleErrorCode =
    | 'AlreadyInitialized'
    | 'NotInitialized'
    | 'MarketAlreadyMigrated'
    | 'MarketAlreadyResolved'
    | 'MarketNotResolved'
    | 'Phase2NotActive'
    | 'PositionAlreadyActive'
    | 'NoActivePosition'
    | 'NoWinningPosition'
    | 'UnsupportedStateVersion';

export type InputErrorCode =
    | 'InvalidAmount'
    | 'InvalidAddress'
    | 'CollateralTooLow'
    | 'InvalidLeverage'
    | 'ArrayLengthMismatch'
    | 'ZeroSharesOut'
    | 'ZeroProceeds'
    | 'NothingToClaim';

export type GuardErrorCode =
    | 'SlippageExceeded'
    | 'PositionHealthy'
    | 'InvalidSignature'
    | 'SignatureExpired'
    | 'ClaimCoolingOff'
    | 'Unauthorized'
    | 'ReentrantCall';

export type SolvencyErrorCode =
    | 'InsufficientInsuranceFunds'
    | 'UtilizationCapExceeded'
    | 'InsufficientBalance'
    | 'MigrationAlreadyFunded'
    | 'NonTransferable';

export type MarketErrorCode =
    | LifecycleErrorCode
    | InputErrorCode
    | GuardErrorCode
    | SolvencyErrorCode;

export type ErrorDetails = Record<string, string | number | boolean | bigint>;

export class MarketError extends Error {
    constructor(
        public readonly code: MarketErrorCode,
        message: string,
        public readonly details: ErrorDetails = {}
    ) {
        super(`[${code}] ${message}`);
        this.name = 'MarketError';
    }
}

export function isMarketError(error: unknown, code?: MarketErrorCode): error is MarketError {
    return error instanceof MarketError && (code === undefined || error.code === code);
}
