import type { Chain } from '../chain/Chain.js';
import { isAddress, type Address } from '../utils/address.js';
import type { TokenMetadata } from './ERC20.js';
import { StandardToken } from './StandardToken.js';
import type { LaunchTokenCapability } from './Token.js';

export interface LaunchInfo {
    /** Launcher contract that issued the token. */
    launcher: Address;
    /** Account that receives the creator share of swap fees. */
    creator?: Address;
}

/**
 * Token issued through the launch platform. Exposes the launch capability
 * so pairs can apply the launch fee schedule.
 */
export class LaunchToken extends StandardToken {
    readonly launch: LaunchTokenCapability;
    readonly launchInfo: Readonly<LaunchInfo>;

    constructor(chain: Chain, meta: TokenMetadata, info: LaunchInfo, owner: Address = chain.sender) {
        super(chain, meta, owner);
        this.launchInfo = {
            launcher: info.launcher.toLowerCase(),
            creator: info.creator?.toLowerCase(),
        };
        const { launcher, creator } = this.launchInfo;
        this.launch = {
            isLaunchToken: () => true,
            launcher: () => (isAddress(launcher) ? launcher : undefined),
            creator: () => (creator !== undefined && isAddress(creator) ? creator : undefined),
        };
    }
}
