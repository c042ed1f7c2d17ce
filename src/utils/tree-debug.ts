import { MCTSNode } from '../mcts-node.js';
import { calculateAvgScore } from './mcts-node-utils.js';

export type ActionFormatter<Action> = (action: Action) => string;

export const formatActionAsJson = <Action>(action: Action): string => JSON.stringify(action);

export const printTree = <Action>(
    node: MCTSNode<Action>,
    formatAction: ActionFormatter<Action> = formatActionAsJson,
    depth: number = 0,
    prefix: string = '',
): void => {
    const indent = '  '.repeat(depth);
    const stats = `visits=${node.visits}, avg=${calculateAvgScore(node).toFixed(4)}, children=${node.children.length}`;
    if (node.parent) {
        const action = node.parent.legalActions[node.actionIndex];
        console.log(`${indent}${prefix}action=${formatAction(action)}: ${stats}`);
    } else {
        console.log(`${indent}${prefix}ROOT: ${stats}, untried=${node.untried.length}`);
    }

    node.children.forEach((child, idx) => {
        printTree(child, formatAction, depth + 1, `[${idx}] `);
    });
};

/**
 * Build the path from root to a given node, returning a readable string.
 * @param node - The node to trace back to root
 * @returns String like "2 → 0 → 4", empty for the root
 */
export const getNodePath = <Action>(node: MCTSNode<Action>, formatAction: ActionFormatter<Action> = formatActionAsJson): string => {
    const actions: string[] = [];
    let current: MCTSNode<Action> = node;

    while (current.parent) {
        actions.unshift(formatAction(current.parent.legalActions[current.actionIndex]));
        current = current.parent;
    }

    return actions.join(' → ');
};

export type TreeStats = {
    nodeCount: number;
    /** Depth of the deepest node, 0 for a lone root */
    maxDepth: number;
    terminalCount: number;
};

export const collectTreeStats = <Action>(root: MCTSNode<Action>): TreeStats => {
    const stats: TreeStats = { nodeCount: 0, maxDepth: 0, terminalCount: 0 };
    const stack: Array<{ node: MCTSNode<Action>, depth: number }> = [{ node: root, depth: 0 }];

    while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) {
            break;
        }
        stats.nodeCount++;
        stats.maxDepth = Math.max(stats.maxDepth, entry.depth);
        if (entry.node.terminal) {
            stats.terminalCount++;
        }
        for (const child of entry.node.children) {
            stack.push({ node: child, depth: entry.depth + 1 });
        }
    }

    return stats;
};
