import { describe, test, expect } from 'vitest';
import { createRng, freshSeed, pick, randomInt, shuffled } from './rng';

describe('rng', () => {
    test('seeded generators repeat', () => {
        const a = createRng('seed-a');
        const b = createRng('seed-a');
        expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    });

    test('numeric and string seeds agree', () => {
        expect(createRng(7)()).toBe(createRng('7')());
    });

    test('randomInt stays in range', () => {
        const rng = createRng('range');
        for (let i = 0; i < 50; i++) {
            const n = randomInt(rng, 4);
            expect(n).toBeGreaterThanOrEqual(0);
            expect(n).toBeLessThan(4);
        }
    });

    test('shuffled permutes a copy', () => {
        const items = [1, 2, 3, 4, 5, 6];
        const result = shuffled(items, createRng('perm'));
        expect(items).toEqual([1, 2, 3, 4, 5, 6]);
        expect([...result].sort((x, y) => x - y)).toEqual(items);
    });

    test('pick refuses an empty list', () => {
        expect(() => pick([], createRng('empty'))).toThrow(RangeError);
    });

    test('fresh seeds differ', () => {
        expect(freshSeed()).not.toBe(freshSeed());
    });
});
