export interface RandomSource {
    // Uniform float in [0, 1)
    next(): number;
}

export class MathRandom implements RandomSource {
    next(): number {
        return Math.random();
    }
}

/**
 * Mulberry32 generator. Two instances built from the same seed produce the same sequence,
 * which makes a whole simulation reproducible.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let x = this.state;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    }
}

export function createRandomSource(seed: number | undefined): RandomSource {
    if (seed === undefined) {
        return new MathRandom();
    }
    return new SeededRandom(seed);
}

export function randomIndex(random: RandomSource, length: number): number {
    if (length <= 0) {
        throw new Error('Cannot pick from an empty collection');
    }
    // Guards against a source that returns exactly 1
    return Math.min(Math.floor(random.next() * length), length - 1);
}
