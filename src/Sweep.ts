import { resolveConfig } from './Config';
import { printInfo } from './Helper';
import SimulationError from './SimulationError';
import Simulator from './Simulator';

export type SweepOptions = {
    honest: number;
    colluding: number;
    rounds: number;
    maxGap: number;
    repeat: number;
    seed?: number;
    verbose?: boolean;
};

export const SWEEP_CSV_HEADER = 'gap,honest_confirmed,colluding_confirmed,abandoned_percent,forks';

export function validateSweepOptions(options: SweepOptions) {
    if (!Number.isInteger(options.repeat) || options.repeat < 1) {
        throw SimulationError.invalidConfiguration(`repeat must be a positive integer, got ${options.repeat}`);
    }
    if (!Number.isInteger(options.maxGap) || options.maxGap < 0) {
        throw SimulationError.invalidConfiguration(`max-gap must be a non-negative integer, got ${options.maxGap}`);
    }
}

/**
 * Runs `repeat` simulations for every gap in [0, maxGap] and returns one averaged CSV row per gap.
 */
export function runSweep(options: SweepOptions): string {
    validateSweepOptions(options);

    const rows = [SWEEP_CSV_HEADER];

    for (let gap = 0; gap <= options.maxGap; gap++) {
        let honestRate = 0;
        let colludingRate = 0;
        let abandonedPercent = 0;
        let forkCount = 0;

        for (let i = 0; i < options.repeat; i++) {
            const config = resolveConfig({
                honest: options.honest,
                colluding: options.colluding,
                rounds: options.rounds,
                gap: gap,
                seed: options.seed === undefined ? undefined : options.seed + i,
            });
            const result = new Simulator(config).simulate();

            honestRate += result.confirmations.honest.rate;
            colludingRate += result.confirmations.colluding.rate;
            abandonedPercent += result.forks.abandonedPercent;
            forkCount += result.forks.forkCount;
        }

        const runs = options.repeat;
        printInfo(options.verbose ?? false, `gap ${gap} done`);
        rows.push(`${gap},${honestRate / runs},${colludingRate / runs},${abandonedPercent / runs},${forkCount / runs}`);
    }

    return rows.join('\n') + '\n';
}
