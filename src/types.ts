export type SimulationConfig = {
    honest: number;
    colluding: number;
    rounds: number;
    gap: number;
    verbose: boolean;
    graph: boolean;
    graph_path: string;
    seed: number | undefined;
};

export enum MinerType {
    HONEST,
    COLLUDING,
}

export type Block = {
    readonly id: number;
    readonly height: number;
    readonly parentId: number | null;
    readonly minerId: string | null;
    readonly minerType: MinerType | null;
    readonly tipWhenMined: boolean;
};

// Read-only view handed to renderers
export type BlockView = Block & {
    readonly canonical: boolean;
};

export type Fork = {
    baseId: number;
    baseHeight: number;
    children: number;
    depth: number;
    abandonedDepth: number;
    span: { from: number; to: number };
};

export type ForkStatistics = {
    forks: Fork[];
    forkCount: number;
    maxDepth: number;
    maxAbandonedDepth: number;
    totalBlocks: number;
    canonicalLength: number;
    abandonedBlocks: number;
    abandonedPercent: number;
};

export type MinerConfirmation = {
    minerId: string;
    minerType: MinerType;
    mined: number;
    included: number;
    rate: number;
};

export type GroupConfirmation = {
    mined: number;
    included: number;
    rate: number;
};

export type ConfirmationStatistics = {
    miners: MinerConfirmation[];
    honest: GroupConfirmation;
    colluding: GroupConfirmation;
};
