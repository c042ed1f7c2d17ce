import { InvalidExpansionError } from '../errors.js';
import { MCTSNode, createChildNode } from '../mcts-node.js';
import type { RandomSource } from '../utils/random.js';
import { ExpansionPolicy } from './mcts-config.js';

/**
 * MCTS Expansion Phase Implementation
 *
 * Takes the node returned by selection and grows the tree by exactly one child.
 *
 * PROCESS:
 * 1. VALIDATE: the node must be non-terminal and have an untried action
 * 2. SELECT: pick one untried action according to the expansion policy
 * 3. APPLY: apply the action to the node's state to obtain the child state
 * 4. CREATE: create the child (visits = 0, totalReward = 0), attach it under
 *    the node and remove the action from the node's untried set
 *
 * The untried set is only updated once the transition succeeded, so a state
 * that throws from `apply` leaves the node unchanged.
 */
export class MCTSExpansion<Action> {
    constructor(
        private readonly policy: ExpansionPolicy,
        private readonly random: RandomSource,
    ) {}

    /**
     * @throws InvalidExpansionError on a terminal node or a node with no untried actions
     */
    expand(node: MCTSNode<Action>): MCTSNode<Action> {
        if (node.terminal) {
            throw new InvalidExpansionError('Cannot expand a terminal node');
        }
        if (node.untried.length === 0) {
            throw new InvalidExpansionError('Cannot expand a node with no untried actions');
        }

        const position = this.policy === 'random' ? this.random.nextInt(node.untried.length) : 0;
        const actionIndex = node.untried[position];

        const childState = node.state.apply(node.legalActions[actionIndex], this.random);
        const child = createChildNode(node, actionIndex, childState);

        node.untried.splice(position, 1);
        node.children.push(child);

        return child;
    }
}
