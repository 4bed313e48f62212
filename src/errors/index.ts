/**
 * Typed errors raised by pair, factory, oracle and math code.
 *
 * Every error carries a machine-readable code so callers (CLI, API, tests)
 * can branch on it without parsing messages.
 */

export type MathErrorCode = 'ArithmeticOverflow' | 'DivisionByZero';

export type PairErrorCode =
    | 'Locked'
    | 'Forbidden'
    | 'AlreadyInitialized'
    | 'NotInitialized'
    | 'InsufficientInitialLiquidity'
    | 'InsufficientLiquidityMinted'
    | 'InsufficientLiquidityBurned'
    | 'InsufficientOutputAmount'
    | 'InsufficientInputAmount'
    | 'InsufficientLiquidity'
    | 'InsufficientAllowance'
    | 'InsufficientBalance'
    | 'InvalidRecipient'
    | 'InvalidCallee'
    | 'KInvariant'
    | 'ReserveOverflow'
    | 'InvalidReserveState'
    | 'TransferFailed'
    | 'IdenticalAddresses'
    | 'ZeroAddress'
    | 'InvalidAddress'
    | 'PairExists'
    | 'PairNotFound'
    | 'InvalidAmount'
    | 'InvalidPeriod'
    | 'InsufficientData'
    | 'StalePrice'
    | 'UpdateTooFrequent';

/**
 * Base class: code + message + optional structured details.
 */
export class AmmError<C extends string = string> extends Error {
    readonly code: C;
    readonly details?: Record<string, unknown>;

    constructor(code: C, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'AmmError';
        this.code = code;
        this.details = details;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Fixed-point and integer arithmetic failures.
 */
export class MathError extends AmmError<MathErrorCode> {
    constructor(code: MathErrorCode, message?: string, details?: Record<string, unknown>) {
        super(code, message ?? code, details);
        this.name = 'MathError';
    }
}

/**
 * Rejections from pair, factory and oracle entry points.
 */
export class PairError extends AmmError<PairErrorCode> {
    constructor(code: PairErrorCode, message?: string, details?: Record<string, unknown>) {
        super(code, message ?? code, details);
        this.name = 'PairError';
    }
}

export function isPairError(err: unknown, code?: PairErrorCode): err is PairError {
    return err instanceof PairError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
    if (err instanceof AmmError) return `${err.code}: ${err.message === err.code ? describeCode(err.code) : err.message}`;
    return err instanceof Error ? err.message : String(err);
}

const CODE_DESCRIPTIONS: Record<string, string> = {
    Locked: 'pair is locked by an operation in progress',
    Forbidden: 'caller is not allowed to perform this operation',
    InsufficientInitialLiquidity: 'first deposit does not exceed the minimum liquidity',
    InsufficientLiquidityMinted: 'deposit too small to mint liquidity',
    InsufficientLiquidityBurned: 'burn would return zero of a token',
    InsufficientOutputAmount: 'both output amounts are zero',
    InsufficientInputAmount: 'no input was received',
    InsufficientLiquidity: 'output exceeds available reserves',
    KInvariant: 'swap would decrease the fee-adjusted constant product',
    ReserveOverflow: 'balance does not fit into 112 bits',
    InvalidReserveState: 'balances cannot cover accumulated fees',
    TransferFailed: 'token transfer failed',
    InsufficientData: 'not enough oracle observations for the requested period',
    StalePrice: 'oracle has not been updated recently',
    UpdateTooFrequent: 'oracle was updated too recently',
    ArithmeticOverflow: 'arithmetic overflow',
    DivisionByZero: 'division by zero',
};

function describeCode(code: string): string {
    return CODE_DESCRIPTIONS[code] ?? code;
}
