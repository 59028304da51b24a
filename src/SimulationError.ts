export type SimulationErrorType = 'InvalidConfiguration' | 'InvalidParent' | 'UnknownBlock';

export default class SimulationError extends Error {
    kind: SimulationErrorType;

    constructor(kind: SimulationErrorType, message: string) {
        super(message);
        this.kind = kind;
        this.name = `SimulationError(${kind})`;
    }

    static invalidConfiguration(message: string) {
        return new SimulationError('InvalidConfiguration', message);
    }

    static invalidParent(parentId: number) {
        return new SimulationError('InvalidParent', `Parent block ${parentId} does not exist in the chain`);
    }

    static unknownBlock(blockId: number) {
        return new SimulationError('UnknownBlock', `Block ${blockId} does not exist in the chain`);
    }
}
