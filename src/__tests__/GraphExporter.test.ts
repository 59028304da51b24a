import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Blockchain from '../Blockchain';
import { saveGraph, toDot } from '../GraphExporter';
import { MinerType } from '../types';

describe('GraphExporter', () => {
    const buildChain = (): Blockchain => {
        const chain = new Blockchain();
        chain.addBlock(0, MinerType.COLLUDING, 'C1');
        chain.addBlock(0, MinerType.HONEST, 'H1');
        return chain;
    };

    const expectedDot = [
        'digraph {',
        '    0 [label="genesis"]',
        '    1 [label="1 (1)" color="blue" style="filled" fillcolor="lightpink" penwidth="2"]',
        '    0 -> 1 [label="C1" style="bold"]',
        '    2 [label="2 (1)"]',
        '    0 -> 2 [label="H1"]',
        '}',
        '',
    ].join('\n');

    it('should describe the tree in DOT', () => {
        expect(toDot(buildChain())).toBe(expectedDot);
    });

    it('should mark colluding blocks that never led the chain', () => {
        const chain = buildChain();
        chain.addBlock(0, MinerType.COLLUDING, 'C2');

        expect(toDot(chain).split('\n')).toContain(
            '    3 [label="3 (1)" color="red" style="filled" fillcolor="lightpink"]',
        );
    });

    it('should write the graph next to the given base name', () => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'collusion-graph-'));
        try {
            const outPath = saveGraph(buildChain(), path.join(tmpDir, 'chain'));

            expect(outPath).toBe(path.join(tmpDir, 'chain.dot'));
            expect(fs.readFileSync(outPath, 'utf8')).toBe(expectedDot);
        } finally {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        }
    });
});
