#!/usr/bin/env node
import { Command } from 'commander';
import 'source-map-support/register';
import { writeFileSync } from 'fs';
import { printError } from './src/Helper';
import SimulationError from './src/SimulationError';
import { SweepOptions, runSweep } from './src/Sweep';

type SweepCliOptions = SweepOptions & {
    out: string;
};

const program = new Command();

program.name('collusion-sweep').description('Sweep the colluding gap and write averaged statistics as CSV').version('1.0.0');
program.requiredOption('-o, --out <string>', 'csv data output path');
program.option('--honest <number>', 'number of honest miners', Number, 3);
program.option('--colluding <number>', 'number of colluding miners', Number, 2);
program.option('--rounds <number>', 'mining rounds per simulation', Number, 1000);
program.option('--max-gap <number>', 'largest gap to simulate', Number, 10);
program.option('--repeat <number>', 'simulations averaged per gap', Number, 5);
program.option('--seed <number>', 'base seed; repetition i uses seed + i', Number);
program.option('--verbose', 'report progress per gap');
program.parse();

const options = program.opts<SweepCliOptions>();

try {
    writeFileSync(options.out, runSweep(options));
} catch (err) {
    if (!(err instanceof SimulationError)) {
        throw err;
    }
    printError(err.message);
    process.exitCode = 1;
}
