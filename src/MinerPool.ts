import ColludingStrategy from './ColludingStrategy';
import HonestStrategy from './HonestStrategy';
import Miner from './Miner';
import { RandomSource, randomIndex } from './Random';
import SimulationError from './SimulationError';
import { MinerType } from './types';

export default class MinerPool {
    miners: Miner[];
    honestStrategy: HonestStrategy;
    colludingStrategy: ColludingStrategy;
    random: RandomSource;

    constructor(honestCount: number, colludingCount: number, gap: number, random: RandomSource) {
        if (honestCount < 0 || colludingCount < 0 || honestCount + colludingCount === 0) {
            throw SimulationError.invalidConfiguration(
                `At least one miner is required (honest: ${honestCount}, colluding: ${colludingCount})`,
            );
        }

        this.random = random;
        this.miners = [];

        // One strategy instance per group, shared by all its miners
        this.honestStrategy = new HonestStrategy();
        this.colludingStrategy = new ColludingStrategy(gap);

        for (let i = 1; i <= honestCount; i++) {
            this.miners.push(new Miner(`H${i}`, MinerType.HONEST, this.honestStrategy));
        }
        for (let i = 1; i <= colludingCount; i++) {
            this.miners.push(new Miner(`C${i}`, MinerType.COLLUDING, this.colludingStrategy));
        }
    }

    // Equal mining power: every miner is equally likely to win the round
    selectMiner(): Miner {
        return this.miners[randomIndex(this.random, this.miners.length)];
    }

    getMiners(): Miner[] {
        return this.miners;
    }

    getHonestMiners(): Miner[] {
        return this.miners.filter((miner) => miner.type === MinerType.HONEST);
    }

    getColludingMiners(): Miner[] {
        return this.miners.filter((miner) => miner.type === MinerType.COLLUDING);
    }
}
