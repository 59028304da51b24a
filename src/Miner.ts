import Blockchain from './Blockchain';
import MiningStrategy from './MiningStrategy';
import { Block, MinerType } from './types';

export default class Miner {
    id: string;
    type: MinerType;
    strategy: MiningStrategy;
    blocksMined: number;
    blocksIncluded: number;

    constructor(id: string, type: MinerType, strategy: MiningStrategy) {
        this.id = id;
        this.type = type;
        this.strategy = strategy;
        this.blocksMined = 0;
        this.blocksIncluded = 0;
    }

    mineBlock(chain: Blockchain): Block {
        const parent = this.strategy.selectParent(chain);
        const block = chain.addBlock(parent.id, this.type, this.id);
        this.strategy.blockMined(block);
        this.blocksMined++;
        return block;
    }
}
