import SimulationError from './SimulationError';
import { Block, BlockView, MinerType } from './types';

export default class Blockchain {
    genesis: Block;
    private blocks: Map<number, Block>;
    private children: Map<number, number[]>;
    private tipIds: Set<number>;
    private tip: Block;

    constructor() {
        this.genesis = {
            id: 0,
            height: 0,
            parentId: null,
            minerId: null,
            minerType: null,
            tipWhenMined: true,
        };
        this.blocks = new Map([[this.genesis.id, this.genesis]]);
        this.children = new Map([[this.genesis.id, []]]);
        this.tipIds = new Set([this.genesis.id]);
        this.tip = this.genesis;
    }

    get size(): number {
        return this.blocks.size;
    }

    addBlock(parentId: number, minerType: MinerType, minerId: string): Block {
        const parent = this.blocks.get(parentId);
        const siblings = this.children.get(parentId);
        if (parent === undefined || siblings === undefined) {
            throw SimulationError.invalidParent(parentId);
        }

        const height = parent.height + 1;

        // Ties keep the earlier tip, so only a strictly higher block takes over
        const becomesTip = height > this.tip.height;

        const block: Block = {
            id: this.blocks.size,
            height: height,
            parentId: parent.id,
            minerId: minerId,
            minerType: minerType,
            tipWhenMined: becomesTip,
        };

        this.blocks.set(block.id, block);
        this.children.set(block.id, []);
        siblings.push(block.id);

        this.tipIds.delete(parent.id);
        this.tipIds.add(block.id);

        if (becomesTip) {
            this.tip = block;
        }

        return block;
    }

    getBlock(blockId: number): Block {
        const block = this.blocks.get(blockId);
        if (block === undefined) {
            throw SimulationError.unknownBlock(blockId);
        }
        return block;
    }

    // Blocks in creation order, genesis first
    getBlocks(): Block[] {
        return Array.from(this.blocks.values());
    }

    getChildren(blockId: number): Block[] {
        const childIds = this.children.get(blockId);
        if (childIds === undefined) {
            throw SimulationError.unknownBlock(blockId);
        }
        return childIds.map((childId) => this.getBlock(childId));
    }

    heightOf(blockId: number): number {
        return this.getBlock(blockId).height;
    }

    tips(): Block[] {
        return Array.from(this.tipIds)
            .sort((a, b) => a - b)
            .map((tipId) => this.getBlock(tipId));
    }

    canonicalTip(): Block {
        return this.tip;
    }

    /**
     * Path from genesis to the canonical tip, genesis first.
     */
    canonicalPath(): Block[] {
        const path: Block[] = [];
        let current: Block | null = this.tip;
        while (current !== null) {
            path.push(current);
            current = current.parentId === null ? null : this.getBlock(current.parentId);
        }
        return path.reverse();
    }

    isCanonical(blockId: number): boolean {
        const block = this.getBlock(blockId);
        if (block.height > this.tip.height) {
            return false;
        }
        return this.canonicalPath()[block.height].id === block.id;
    }

    toTree(): BlockView[] {
        const canonicalIds = new Set(this.canonicalPath().map((block) => block.id));
        return this.getBlocks().map((block) => ({
            ...block,
            canonical: canonicalIds.has(block.id),
        }));
    }
}
