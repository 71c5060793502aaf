/**
 * @module envs/ts/report
 * @description Data behind the link panel: both nodes, the last MCS and the
 * last counts
 */

import type { Tensor } from '../../core/tensor';

export interface LinkNode {
    label: 'STA' | 'AP';
    x: number;
    y: number;
}

export interface LinkPanel {
    title: string;
    nodes: LinkNode[];
    /** Annotation lines, top to bottom */
    lines: string[];
}

export function makeLinkPanel(observation: Tensor, mcs: number | undefined): LinkPanel {
    const lines: string[] = [];
    if (mcs !== undefined) {
        lines.push(`Action: MCS=${mcs}`);
    }
    lines.push(`Obs: Succ=${observation.get(0, 0)}`);
    lines.push(`Obs: Fail=${observation.get(1, 0)}`);

    return {
        title: 'Network graph',
        nodes: [
            { label: 'STA', x: 0, y: 0 },
            { label: 'AP', x: 0, y: 1 },
        ],
        lines,
    };
}
