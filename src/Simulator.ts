import { SingleBar as ProgressSingleBar, Presets as ProgressPreset } from 'cli-progress';
import Blockchain from './Blockchain';
import { analyzeConfirmations } from './ConfirmationAnalyzer';
import { validateConfig } from './Config';
import { analyzeForks } from './ForkAnalyzer';
import { printInfo } from './Helper';
import Miner from './Miner';
import MinerPool from './MinerPool';
import { RandomSource, createRandomSource } from './Random';
import { ConfirmationStatistics, ForkStatistics, SimulationConfig } from './types';

export type SimulationResult = {
    chain: Blockchain;
    miners: Miner[];
    forks: ForkStatistics;
    confirmations: ConfirmationStatistics;
    capitulations: number;
};

export default class Simulator {
    config: SimulationConfig;
    simulationRounds: number;
    chain: Blockchain;
    pool: MinerPool;
    showProgress: boolean;

    constructor(config: SimulationConfig, random?: RandomSource, showProgress = false) {
        // Reject bad input before a single round runs
        this.config = validateConfig(config);
        this.simulationRounds = this.config.rounds;
        this.showProgress = showProgress;

        this.chain = new Blockchain();
        this.pool = new MinerPool(
            this.config.honest,
            this.config.colluding,
            this.config.gap,
            random ?? createRandomSource(this.config.seed),
        );
    }

    simulate(): SimulationResult {
        const progressBar = new ProgressSingleBar({}, ProgressPreset.shades_classic);
        if (this.showProgress) {
            progressBar.start(this.simulationRounds, 0);
        }

        for (let round = 1; round <= this.simulationRounds; round++) {
            const miner = this.pool.selectMiner();
            const block = miner.mineBlock(this.chain);

            printInfo(
                this.config.verbose,
                `Round ${round}: ${miner.id} mined block ${block.id} at height ${block.height} on ${block.parentId}` +
                    (block.tipWhenMined ? ' (new tip)' : ''),
            );

            if (this.showProgress) {
                progressBar.update(round);
            }
        }

        if (this.showProgress) {
            progressBar.stop();
        }

        return this.collectResults();
    }

    private collectResults(): SimulationResult {
        const miners = this.pool.getMiners();
        const confirmations = analyzeConfirmations(this.chain, miners);

        for (const minerConfirmation of confirmations.miners) {
            const miner = miners.find((candidate) => candidate.id === minerConfirmation.minerId);
            if (miner !== undefined) {
                miner.blocksIncluded = minerConfirmation.included;
            }
        }

        return {
            chain: this.chain,
            miners: miners,
            forks: analyzeForks(this.chain),
            confirmations: confirmations,
            capitulations: this.pool.colludingStrategy.capitulations,
        };
    }
}
