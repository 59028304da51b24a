import { RandomSource } from '../../Random';

// Replays the given values in order, wrapping around at the end
export default class ScriptedRandom implements RandomSource {
    private idx = 0;

    constructor(private values: number[]) {}

    next(): number {
        const value = this.values[this.idx % this.values.length];
        this.idx++;
        return value;
    }
}
