import { writeFileSync } from 'fs';
import Blockchain from './Blockchain';
import { BlockView, MinerType } from './types';

function nodeAttributes(block: BlockView): Record<string, string> {
    const attrs: Record<string, string> = {
        label: block.parentId === null ? 'genesis' : `${block.id} (${block.height})`,
    };

    if (block.minerType === MinerType.COLLUDING) {
        attrs.color = 'red';
        attrs.style = 'filled';
        attrs.fillcolor = 'lightpink';
    }

    // Head of the longest chain at the time it was mined
    if (block.tipWhenMined && block.parentId !== null) {
        attrs.color = 'blue';
        attrs.penwidth = '2';
    }

    return attrs;
}

function formatAttributes(attrs: Record<string, string>): string {
    return Object.entries(attrs)
        .map(([key, value]) => `${key}="${value}"`)
        .join(' ');
}

/**
 * Graphviz DOT description of the whole block tree.
 */
export function toDot(chain: Blockchain): string {
    const lines: string[] = ['digraph {'];

    for (const block of chain.toTree()) {
        lines.push(`    ${block.id} [${formatAttributes(nodeAttributes(block))}]`);

        if (block.parentId !== null) {
            const edgeAttrs: Record<string, string> = { label: block.minerId ?? '' };
            if (block.canonical) {
                edgeAttrs.style = 'bold';
            }
            lines.push(`    ${block.parentId} -> ${block.id} [${formatAttributes(edgeAttrs)}]`);
        }
    }

    lines.push('}');
    return lines.join('\n') + '\n';
}

export function saveGraph(chain: Blockchain, filename: string): string {
    const outPath = `${filename}.dot`;
    writeFileSync(outPath, toDot(chain));
    return outPath;
}
