import Blockchain from './Blockchain';
import MiningStrategy from './MiningStrategy';
import { Block } from './types';

/**
 * Shared by every colluding miner. The group keeps building on its own fork until the public
 * chain gets more than `gap` blocks ahead of it, then gives up and moves to the public tip.
 */
export default class ColludingStrategy implements MiningStrategy {
    gap: number;
    forkPointer: Block | null;
    capitulations: number;

    constructor(gap: number) {
        this.gap = gap;
        this.forkPointer = null;
        this.capitulations = 0;
    }

    selectParent(chain: Blockchain): Block {
        const tip = chain.canonicalTip();

        if (this.forkPointer === null) {
            this.forkPointer = tip;
        } else if (this.forkPointer.height + this.gap < tip.height) {
            // Public chain outpaced the fork, give it up
            this.forkPointer = tip;
            this.capitulations++;
        }

        return this.forkPointer;
    }

    blockMined(block: Block): void {
        this.forkPointer = block;
    }
}
