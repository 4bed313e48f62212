export { Pair, MINIMUM_LIQUIDITY } from './Pair.js';
export { PairLock } from './PairLock.js';
export { InvariantChecker } from './InvariantChecker.js';
export { PriceAccumulator } from './PriceAccumulator.js';
export { getAmountIn, getAmountOut, quote, sortTokens } from './library.js';
export { EMPTY_DATA, isPonderCallee } from './types.js';
export type {
    BurnResult,
    CallbackData,
    PairHost,
    PairState,
    PonderCallee,
    Reserves,
    SwapResult,
} from './types.js';
