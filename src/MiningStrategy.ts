import Blockchain from './Blockchain';
import { Block } from './types';

export default interface MiningStrategy {
    // Block the winning miner builds on this round
    selectParent(chain: Blockchain): Block;

    blockMined(block: Block): void;
}
