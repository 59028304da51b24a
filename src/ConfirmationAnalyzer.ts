import Blockchain from './Blockchain';
import Miner from './Miner';
import { ConfirmationStatistics, GroupConfirmation, MinerConfirmation, MinerType } from './types';

function minerRate(included: number, mined: number): number {
    return mined === 0 ? 0 : included / mined;
}

function groupConfirmation(miners: MinerConfirmation[], type: MinerType): GroupConfirmation {
    let mined = 0;
    let included = 0;
    for (const miner of miners) {
        if (miner.minerType === type) {
            mined += miner.mined;
            included += miner.included;
        }
    }
    // A group with nothing mined lost nothing
    return { mined: mined, included: included, rate: mined === 0 ? 1 : included / mined };
}

export function analyzeConfirmations(chain: Blockchain, miners: Miner[]): ConfirmationStatistics {
    // Count canonical blocks per miner
    const includedBlocks = new Map<string, number>();
    for (const block of chain.canonicalPath()) {
        if (block.minerId !== null) {
            includedBlocks.set(block.minerId, (includedBlocks.get(block.minerId) ?? 0) + 1);
        }
    }

    const minerConfirmations: MinerConfirmation[] = miners.map((miner) => {
        const included = includedBlocks.get(miner.id) ?? 0;
        return {
            minerId: miner.id,
            minerType: miner.type,
            mined: miner.blocksMined,
            included: included,
            rate: minerRate(included, miner.blocksMined),
        };
    });

    return {
        miners: minerConfirmations,
        honest: groupConfirmation(minerConfirmations, MinerType.HONEST),
        colluding: groupConfirmation(minerConfirmations, MinerType.COLLUDING),
    };
}
