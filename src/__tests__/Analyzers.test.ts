import Blockchain from '../Blockchain';
import { analyzeConfirmations } from '../ConfirmationAnalyzer';
import { analyzeForks } from '../ForkAnalyzer';
import HonestStrategy from '../HonestStrategy';
import Miner from '../Miner';
import { MinerType } from '../types';

//        0
//        |
//        1 (H1)
//       / \
//  (H1) 2   3 (C1)
//      / \   / \
//     5   7 4   6
//
// 4 is the canonical tip: first block at height 3
const buildForkedChain = (): Blockchain => {
    const chain = new Blockchain();
    chain.addBlock(0, MinerType.HONEST, 'H1'); // 1
    chain.addBlock(1, MinerType.HONEST, 'H1'); // 2
    chain.addBlock(1, MinerType.COLLUDING, 'C1'); // 3
    chain.addBlock(3, MinerType.COLLUDING, 'C1'); // 4
    chain.addBlock(2, MinerType.HONEST, 'H1'); // 5
    chain.addBlock(3, MinerType.COLLUDING, 'C1'); // 6
    chain.addBlock(2, MinerType.HONEST, 'H1'); // 7
    return chain;
};

describe('analyzeForks', () => {
    it('should report nothing for a straight chain', () => {
        const chain = new Blockchain();
        chain.addBlock(0, MinerType.HONEST, 'H1');
        chain.addBlock(1, MinerType.HONEST, 'H1');

        expect(analyzeForks(chain)).toEqual({
            forks: [],
            forkCount: 0,
            maxDepth: 0,
            maxAbandonedDepth: 0,
            totalBlocks: 2,
            canonicalLength: 2,
            abandonedBlocks: 0,
            abandonedPercent: 0,
        });
    });

    it('should report zero percent for an empty run', () => {
        expect(analyzeForks(new Blockchain()).abandonedPercent).toBe(0);
    });

    it('should measure every fork point', () => {
        const stats = analyzeForks(buildForkedChain());

        expect(stats.forks).toEqual([
            { baseId: 1, baseHeight: 1, children: 2, depth: 2, abandonedDepth: 2, span: { from: 2, to: 3 } },
            { baseId: 2, baseHeight: 2, children: 2, depth: 1, abandonedDepth: 1, span: { from: 3, to: 3 } },
            { baseId: 3, baseHeight: 2, children: 2, depth: 1, abandonedDepth: 1, span: { from: 3, to: 3 } },
        ]);
        expect(stats.forkCount).toBe(3);
        expect(stats.maxDepth).toBe(2);
        expect(stats.maxAbandonedDepth).toBe(2);
    });

    it('should count blocks off the canonical path as abandoned', () => {
        const stats = analyzeForks(buildForkedChain());

        expect(stats.totalBlocks).toBe(7);
        expect(stats.canonicalLength).toBe(3);
        expect(stats.abandonedBlocks).toBe(4);
        expect(stats.abandonedPercent).toBeCloseTo((4 / 7) * 100);
    });
});

describe('analyzeConfirmations', () => {
    const strategy = new HonestStrategy();

    const makeMiner = (id: string, type: MinerType, mined: number): Miner => {
        const miner = new Miner(id, type, strategy);
        miner.blocksMined = mined;
        return miner;
    };

    it('should count canonical blocks per miner and per group', () => {
        const miners = [
            makeMiner('H1', MinerType.HONEST, 4),
            makeMiner('H2', MinerType.HONEST, 0),
            makeMiner('C1', MinerType.COLLUDING, 3),
        ];

        const stats = analyzeConfirmations(buildForkedChain(), miners);

        expect(stats.miners).toEqual([
            { minerId: 'H1', minerType: MinerType.HONEST, mined: 4, included: 1, rate: 0.25 },
            { minerId: 'H2', minerType: MinerType.HONEST, mined: 0, included: 0, rate: 0 },
            { minerId: 'C1', minerType: MinerType.COLLUDING, mined: 3, included: 2, rate: 2 / 3 },
        ]);
        expect(stats.honest).toEqual({ mined: 4, included: 1, rate: 0.25 });
        expect(stats.colluding).toEqual({ mined: 3, included: 2, rate: 2 / 3 });
    });

    it('should report a full rate for a group that mined nothing', () => {
        const chain = new Blockchain();
        chain.addBlock(0, MinerType.HONEST, 'H1');

        const stats = analyzeConfirmations(chain, [makeMiner('H1', MinerType.HONEST, 1)]);

        expect(stats.honest).toEqual({ mined: 1, included: 1, rate: 1 });
        expect(stats.colluding).toEqual({ mined: 0, included: 0, rate: 1 });
    });
});
