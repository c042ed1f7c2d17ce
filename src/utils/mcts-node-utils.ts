import { MCTSNode } from '../mcts-node.js';

export const DEFAULT_EXPLORATION_CONSTANT = Math.SQRT2;

export function calculateAvgScore<Action>(node: MCTSNode<Action>): number {
    return node.visits > 0 ? node.totalReward / node.visits : 0;
}

/**
 * Calculates the UCT (Upper Confidence bound applied to Trees) score for a node.
 * UCT = exploitation + exploration = (total_reward / visits) + c * sqrt(ln(parent_visits) / visits)
 * Unvisited nodes return Infinity to ensure they are selected first.
 *
 * @param node - The node to calculate the UCT score for
 * @param parentVisits - Visit count of the node's parent
 * @param explorationConstant - Weight of the exploration term (c)
 * @returns The UCT score, or Infinity for unvisited nodes
 */
export function getUCTScore<Action>(node: MCTSNode<Action>, parentVisits: number, explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT): number {
    if (node.visits === 0) {
        return Infinity;
    }

    const exploitation = calculateAvgScore(node);
    const exploration = explorationConstant * Math.sqrt(Math.log(parentVisits) / node.visits);

    return exploitation + exploration;
}

/**
 * Selects the child with the highest UCT score.
 *
 * Any unvisited child scores Infinity, so every child is tried once before any
 * child is revisited. Ties go to the child whose action comes first in the
 * parent's legal-action enumeration, which keeps the choice reproducible.
 *
 * Only meaningful on fully expanded nodes: a node with untried actions is
 * expanded rather than descended through.
 */
export function selectUCTChild<Action>(node: MCTSNode<Action>, explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT): MCTSNode<Action> {
    if (node.children.length === 0) {
        throw new Error('selectUCTChild called on a node without children');
    }

    let bestChild = node.children[0];
    let bestScore = getUCTScore(bestChild, node.visits, explorationConstant);

    for (const child of node.children) {
        const score = getUCTScore(child, node.visits, explorationConstant);
        if (score > bestScore || (score === bestScore && child.actionIndex < bestChild.actionIndex)) {
            bestScore = score;
            bestChild = child;
        }
    }

    return bestChild;
}

/**
 * Orders children for the final recommendation (robust child): most visits
 * first, then highest mean reward, then enumeration order.
 */
export function compareRobust<Action>(a: MCTSNode<Action>, b: MCTSNode<Action>): number {
    if (a.visits !== b.visits) {
        return b.visits - a.visits;
    }
    const scoreDelta = calculateAvgScore(b) - calculateAvgScore(a);
    if (scoreDelta !== 0) {
        return scoreDelta;
    }
    return a.actionIndex - b.actionIndex;
}
