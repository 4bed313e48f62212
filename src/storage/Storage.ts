import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { restoreChain, serializeChain, type ChainSnapshot, type Deployment } from './state.js';

const BIGINT_TAG = '$bigint';

function replacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? { [BIGINT_TAG]: value.toString() } : value;
}

function reviver(_key: string, value: unknown): unknown {
    if (typeof value === 'object' && value !== null && BIGINT_TAG in value) {
        const raw = value[BIGINT_TAG];
        if (typeof raw === 'string') return BigInt(raw);
    }
    return value;
}

export function encodeSnapshot(snapshot: ChainSnapshot): string {
    return JSON.stringify(snapshot, replacer, 2);
}

export function decodeSnapshot(content: string): ChainSnapshot {
    return JSON.parse(content, reviver);
}

export class Storage {
    private statePath: string;

    constructor(statePath: string = config.storage.statePath) {
        this.statePath = statePath;
    }

    get path(): string {
        return this.statePath;
    }

    private ensureDirectory(): void {
        const dir = path.dirname(this.statePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    exists(): boolean {
        return fs.existsSync(this.statePath);
    }

    save(deployment: Deployment): void {
        this.ensureDirectory();
        fs.writeFileSync(this.statePath, encodeSnapshot(serializeChain(deployment)));
        logger.debug(`💾 State saved to ${this.statePath}`);
    }

    load(): Deployment | null {
        if (!this.exists()) {
            return null;
        }
        const content = fs.readFileSync(this.statePath, 'utf-8');
        return restoreChain(decodeSnapshot(content));
    }

    clear(): boolean {
        if (this.exists()) {
            fs.unlinkSync(this.statePath);
            return true;
        }
        return false;
    }
}

export const storage = new Storage();
