import chalk from 'chalk';
import Table from 'cli-table';
import { SimulationResult } from './Simulator';
import { GroupConfirmation, MinerType } from './types';

export function formatPercent(rate: number): string {
    return `${(Math.round(rate * 10000) / 100).toString()}%`;
}

function minerTypeName(type: MinerType): string {
    return type === MinerType.HONEST ? 'Honest' : 'Colluding';
}

function groupRow(name: string, group: GroupConfirmation): string[] {
    return [chalk.bold.italic(name), group.mined.toString(), group.included.toString(), formatPercent(group.rate)];
}

export function printStatistics(result: SimulationResult, verbose: boolean) {
    const { forks, confirmations } = result;

    console.log(chalk.bold('Fork statistics:'));

    const tableForks = new Table({
        head: ['# forks', 'Max depth', 'Max abandoned depth', 'Abandoned blocks', 'Colluding capitulations'],
    });
    tableForks.push([
        forks.forkCount.toString(),
        forks.maxDepth.toString(),
        forks.maxAbandonedDepth.toString(),
        `${forks.abandonedBlocks}/${forks.totalBlocks} (${formatPercent(forks.abandonedPercent / 100)})`,
        result.capitulations.toString(),
    ]);
    console.log(tableForks.toString());

    if (verbose) {
        for (const fork of forks.forks) {
            console.log(`  * From height ${fork.span.from} to ${fork.span.to} (${fork.abandonedDepth} abandoned)`);
        }

        console.log(chalk.bold('Miner statistics:'));
        const tableMiners = new Table({
            head: ['Miner', 'Group', '# mined', '# included', 'Confirmed'],
        });
        for (const miner of confirmations.miners) {
            tableMiners.push([
                miner.minerId,
                minerTypeName(miner.minerType),
                miner.mined.toString(),
                miner.included.toString(),
                formatPercent(miner.rate),
            ]);
        }
        console.log(tableMiners.toString());
    }

    console.log(chalk.bold('Group statistics:'));
    const tableGroups = new Table({
        head: ['Group', '# mined', '# included', 'Confirmed'],
    });
    tableGroups.push(groupRow('Honest', confirmations.honest));
    tableGroups.push(groupRow('Colluding', confirmations.colluding));
    console.log(tableGroups.toString());
}

export function printInfo(enabled: boolean, msg: string) {
    if (enabled) {
        console.log(chalk.dim(msg));
    }
}

export function printError(msg: string) {
    console.error(chalk.red(msg));
}
