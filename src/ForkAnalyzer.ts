import Blockchain from './Blockchain';
import { Fork, ForkStatistics } from './types';

export function analyzeForks(chain: Blockchain): ForkStatistics {
    const blocks = chain.getBlocks();
    const canonicalIds = new Set(chain.canonicalPath().map((block) => block.id));

    // Children always have a higher id than their parent, so walking ids backwards
    // visits every subtree before its root
    const deepestHeight = new Map<number, number>();
    for (let i = blocks.length - 1; i >= 0; i--) {
        const block = blocks[i];
        let deepest = block.height;
        for (const child of chain.getChildren(block.id)) {
            deepest = Math.max(deepest, deepestHeight.get(child.id) ?? child.height);
        }
        deepestHeight.set(block.id, deepest);
    }

    const forks: Fork[] = [];
    for (const block of blocks) {
        const children = chain.getChildren(block.id);
        if (children.length < 2) {
            continue;
        }

        const deepest = deepestHeight.get(block.id) ?? block.height;
        let deepestAbandoned = block.height;
        for (const child of children) {
            if (!canonicalIds.has(child.id)) {
                deepestAbandoned = Math.max(deepestAbandoned, deepestHeight.get(child.id) ?? child.height);
            }
        }

        forks.push({
            baseId: block.id,
            baseHeight: block.height,
            children: children.length,
            depth: deepest - block.height,
            abandonedDepth: deepestAbandoned - block.height,
            span: { from: block.height + 1, to: deepest },
        });
    }

    const totalBlocks = chain.size - 1;
    const canonicalLength = canonicalIds.size - 1;
    const abandonedBlocks = totalBlocks - canonicalLength;

    return {
        forks: forks,
        forkCount: forks.length,
        maxDepth: forks.reduce((max, fork) => Math.max(max, fork.depth), 0),
        maxAbandonedDepth: forks.reduce((max, fork) => Math.max(max, fork.abandonedDepth), 0),
        totalBlocks: totalBlocks,
        canonicalLength: canonicalLength,
        abandonedBlocks: abandonedBlocks,
        abandonedPercent: totalBlocks === 0 ? 0 : (abandonedBlocks / totalBlocks) * 100,
    };
}
