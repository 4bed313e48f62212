import type { Chain } from '../chain/Chain.js';
import { PairError } from '../errors/index.js';
import { sameAddress, type Address } from '../utils/address.js';
import { ERC20, type TokenMetadata } from './ERC20.js';

/**
 * Plain fungible token with an owner who may mint.
 */
export class StandardToken extends ERC20 {
    readonly owner: Address;

    constructor(chain: Chain, meta: TokenMetadata, owner: Address = chain.sender) {
        super(chain, meta, owner);
        this.owner = owner.toLowerCase();
        chain.deploy(this, this);
    }

    mint(to: Address, amount: bigint): void {
        if (!sameAddress(this.chain.sender, this.owner)) {
            throw new PairError('Forbidden', `${this.symbol}: only the owner can mint`);
        }
        this._mint(to, amount);
    }

    burn(amount: bigint): void {
        this._burn(this.chain.sender, amount);
    }
}
