import { MCTSNode } from '../mcts-node.js';

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Propagates a rollout's reward from the node it started at up to the root,
 * following the `parent` links. Every node on that path, root included, gets
 * one more visit and the full reward: all rewards are from the single
 * decision-maker's perspective, so nothing is negated on the way up.
 */
export class MCTSBackpropagation<Action> {
    backpropagate(node: MCTSNode<Action>, reward: number): void {
        let current: MCTSNode<Action> | undefined = node;

        while (current !== undefined) {
            current.visits++;
            current.totalReward += reward;
            current = current.parent;
        }
    }
}
