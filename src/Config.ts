import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import SimulationError from './SimulationError';
import { SimulationConfig } from './types';

export type RawConfig = { [key: string]: unknown };

// Seeds feed a 32-bit generator state
export const MAX_SEED = 0xffffffff;

export const DEFAULT_CONFIG: SimulationConfig = {
    honest: 3,
    colluding: 2,
    rounds: 10000,
    gap: 5,
    verbose: false,
    graph: false,
    graph_path: 'blockchain_simulation',
    seed: undefined,
};

function isRecord(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readCount(raw: RawConfig, key: string): number {
    const value = raw[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw SimulationError.invalidConfiguration(`${key} must be a non-negative integer, got ${String(value)}`);
    }
    return value;
}

function readFlag(raw: RawConfig, key: string): boolean {
    const value = raw[key];
    if (typeof value !== 'boolean') {
        throw SimulationError.invalidConfiguration(`${key} must be a boolean, got ${String(value)}`);
    }
    return value;
}

function readSeed(raw: RawConfig): number | undefined {
    const value = raw.seed;
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_SEED) {
        throw SimulationError.invalidConfiguration(`seed must be an integer in [0, ${MAX_SEED}], got ${String(value)}`);
    }
    return value;
}

export function validateConfig(raw: RawConfig): SimulationConfig {
    const honest = readCount(raw, 'honest');
    const colluding = readCount(raw, 'colluding');
    if (honest + colluding === 0) {
        throw SimulationError.invalidConfiguration('At least one honest or colluding miner is required');
    }

    // An unbounded gap means the colluding group never gives up its fork
    const gap = raw.gap === Infinity ? Infinity : readCount(raw, 'gap');

    const seed = readSeed(raw);

    const graphPath = raw.graph_path;
    if (typeof graphPath !== 'string' || graphPath.length === 0) {
        throw SimulationError.invalidConfiguration(`graph_path must be a non-empty string, got ${String(graphPath)}`);
    }

    return {
        honest: honest,
        colluding: colluding,
        rounds: readCount(raw, 'rounds'),
        gap: gap,
        verbose: readFlag(raw, 'verbose'),
        graph: readFlag(raw, 'graph'),
        graph_path: graphPath,
        seed: seed,
    };
}

/**
 * Merge configuration layers; later layers win and `undefined` values are skipped.
 */
export function resolveConfig(...layers: RawConfig[]): SimulationConfig {
    const merged: RawConfig = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }
    return validateConfig(merged);
}

/**
 * Read a YAML file holding a list of named simulations:
 *
 *     - baseline:
 *         honest: 3
 *         colluding: 2
 *
 * Returns the simulation called `name`, or the first one when no name is given.
 */
export function loadConfigFile(configPath: string, name?: string): RawConfig {
    let parsed: unknown;
    try {
        parsed = parseYaml(readFileSync(configPath, 'utf8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw SimulationError.invalidConfiguration(`Cannot read config file ${configPath}: ${reason}`);
    }

    if (!Array.isArray(parsed)) {
        throw SimulationError.invalidConfiguration(`Config file ${configPath} must contain a list of simulations`);
    }

    for (const entry of parsed) {
        if (!isRecord(entry)) {
            throw SimulationError.invalidConfiguration(`Config file ${configPath} has a malformed simulation entry`);
        }
        for (const [simulationName, params] of Object.entries(entry)) {
            if (name !== undefined && simulationName !== name) {
                continue;
            }
            if (!isRecord(params)) {
                throw SimulationError.invalidConfiguration(`Simulation ${simulationName} must be a map of parameters`);
            }
            return params;
        }
    }

    throw SimulationError.invalidConfiguration(
        name === undefined ? `Config file ${configPath} has no simulations` : `Simulation ${name} not found in ${configPath}`,
    );
}
