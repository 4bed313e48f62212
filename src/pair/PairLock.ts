import { PairError } from '../errors/index.js';

/**
 * Exclusive-access token owned by one pair. Reentry while held fails with
 * `Locked`; the lock is released on every exit path.
 */
export class PairLock {
    private held = false;
    private readonly owner: string;

    constructor(owner: string) {
        this.owner = owner;
    }

    get locked(): boolean {
        return this.held;
    }

    run<T>(fn: () => T): T {
        if (this.held) {
            throw new PairError('Locked', 'Locked', { pair: this.owner });
        }
        this.held = true;
        try {
            return fn();
        } finally {
            this.held = false;
        }
    }
}
