import { describe, it, expect } from 'vitest';
import { MathError } from '../../src/errors/index.js';
import {
    MAX_UINT256,
    MAX_UINT32,
    assertUint,
    min,
    sqrt,
    toUint32,
    wrappingAdd256,
    wrappingSub256,
    wrappingSub32,
} from '../../src/math/uint.js';

describe('uint helpers', () => {
    it('sqrt floors', () => {
        expect(sqrt(0n)).toBe(0n);
        expect(sqrt(1n)).toBe(1n);
        expect(sqrt(3n)).toBe(1n);
        expect(sqrt(15n)).toBe(3n);
        expect(sqrt(16n)).toBe(4n);
        expect(sqrt(250_000n)).toBe(500n);
        expect(sqrt(10n ** 24n)).toBe(10n ** 12n);
    });

    it('sqrt rejects negative input', () => {
        expect(() => sqrt(-1n)).toThrow(MathError);
    });

    it('truncates to 32 bits', () => {
        expect(toUint32(2n ** 32n + 5n)).toBe(5n);
        expect(toUint32(1_700_000_000)).toBe(1_700_000_000n);
    });

    it('subtracts timestamps across the 32-bit wrap', () => {
        expect(wrappingSub32(5n, MAX_UINT32 - 4n)).toBe(10n);
    });

    it('wraps 256-bit accumulators', () => {
        expect(wrappingAdd256(MAX_UINT256, 2n)).toBe(1n);
        expect(wrappingSub256(1n, 2n)).toBe(MAX_UINT256);
    });

    it('assertUint enforces the range', () => {
        expect(assertUint(7n, MAX_UINT32)).toBe(7n);
        expect(() => assertUint(MAX_UINT32 + 1n, MAX_UINT32)).toThrow(MathError);
    });

    it('min picks the smaller value', () => {
        expect(min(3n, 2n)).toBe(2n);
        expect(min(-1n, 0n)).toBe(-1n);
    });
});
