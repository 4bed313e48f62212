export { Storage, storage, encodeSnapshot, decodeSnapshot } from './Storage.js';
export {
    SNAPSHOT_VERSION,
    findPair,
    findToken,
    listTokens,
    restoreChain,
    serializeChain,
} from './state.js';
export type { ChainSnapshot, Deployment, PairSnapshot, TokenSnapshot } from './state.js';
