import seedrandom from 'seedrandom';
import { v4 as uuidv4 } from 'uuid';

// Explicit generator value, threaded through every call that needs randomness
export type Rng = () => number;

export function createRng(seed: string | number): Rng {
    return seedrandom(String(seed));
}

export function freshSeed(): string {
    return uuidv4();
}

export function randomInt(rng: Rng, maxExclusive: number): number {
    return Math.floor(rng() * maxExclusive);
}

// Fisher-Yates
export function shuffleInPlace<T>(items: T[], rng: Rng): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = randomInt(rng, i + 1);
        [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
}

export function shuffled<T>(items: readonly T[], rng: Rng): T[] {
    return shuffleInPlace([...items], rng);
}

export function pick<T>(items: readonly T[], rng: Rng): T {
    if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    return items[randomInt(rng, items.length)];
}
