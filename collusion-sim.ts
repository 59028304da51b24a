#!/usr/bin/env node
import { Command } from 'commander';
import 'source-map-support/register';
import { RawConfig, loadConfigFile, resolveConfig } from './src/Config';
import { saveGraph } from './src/GraphExporter';
import { printError, printStatistics } from './src/Helper';
import SimulationError from './src/SimulationError';
import Simulator from './src/Simulator';

type CliOptions = {
    config?: string;
    simulation?: string;
    honest?: number;
    colluding?: number;
    rounds?: number;
    gap?: number;
    seed?: number;
    verbose?: boolean;
    graph?: boolean;
    progress: boolean;
};

const parseNumber = (value: string) => (value === 'inf' ? Infinity : Number(value));

const program = new Command();

program
    .name('collusion-sim')
    .description('Simulate honest and colluding miners and measure forks and confirmations')
    .version('1.0.0');
program.option('-c, --config <string>', 'YAML configuration path');
program.option('-s, --simulation <string>', 'simulation name inside the configuration file');
program.option('--honest <number>', 'number of honest miners (default 3)', parseNumber);
program.option('--colluding <number>', 'number of colluding miners (default 2)', parseNumber);
program.option('--rounds <number>', 'number of mining rounds to simulate (default 10000)', parseNumber);
program.option('--gap <number>', 'gap allowed on the colluding fork, "inf" for unbounded (default 5)', parseNumber);
program.option('--seed <number>', 'seed for a reproducible run', parseNumber);
program.option('--verbose', 'print more information');
program.option('--graph', 'write a Graphviz graph of the blockchain');
program.option('--no-progress', 'hide the progress bar');
program.parse();

const options = program.opts<CliOptions>();

try {
    const fileConfig: RawConfig = options.config === undefined ? {} : loadConfigFile(options.config, options.simulation);
    const config = resolveConfig(fileConfig, {
        honest: options.honest,
        colluding: options.colluding,
        rounds: options.rounds,
        gap: options.gap,
        seed: options.seed,
        verbose: options.verbose,
        graph: options.graph,
    });

    const simulator = new Simulator(config, undefined, options.progress && !config.verbose);
    const result = simulator.simulate();

    if (config.graph) {
        const graphPath = saveGraph(result.chain, config.graph_path);
        console.log(`Graph written to ${graphPath}`);
    }
    printStatistics(result, config.verbose);
} catch (err) {
    if (!(err instanceof SimulationError)) {
        throw err;
    }
    printError(err.message);
    process.exitCode = 1;
}
