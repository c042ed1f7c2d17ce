import { MCTSNode, isFullyExpanded } from '../mcts-node.js';
import { selectUCTChild } from '../utils/mcts-node-utils.js';

/**
 * MCTS Selection Phase Implementation
 *
 * Descends from the root using the UCT policy until it reaches a node that is
 * either terminal or still has untried actions.
 *
 * POSTCONDITION (select method):
 * - Returns a node that is terminal, or has at least one untried action
 * - The path from the root to the returned node is recoverable through the
 *   `parent` links, which is what backpropagation walks
 *
 * A node with untried actions is never descended past: it is handed to the
 * expansion phase instead.
 */
export class MCTSSelection<Action> {
    constructor(private readonly explorationConstant: number) {}

    select(root: MCTSNode<Action>): MCTSNode<Action> {
        let currentNode = root;

        while (!currentNode.terminal && isFullyExpanded(currentNode)) {
            currentNode = selectUCTChild(currentNode, this.explorationConstant);
        }

        return currentNode;
    }
}
