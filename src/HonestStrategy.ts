import Blockchain from './Blockchain';
import MiningStrategy from './MiningStrategy';
import { Block } from './types';

export default class HonestStrategy implements MiningStrategy {
    selectParent(chain: Blockchain): Block {
        // Honest miners always extend the longest public chain
        return chain.canonicalTip();
    }

    blockMined(block: Block): void {
        return;
    }
}
