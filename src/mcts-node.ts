import type { SearchState } from './mcts-types.js';

/**
 * Represents a node in the MCTS search tree.
 *
 * Each node wraps the state reached by applying a sequence of actions from the
 * root. Nodes store statistics (visits, total reward) used by the UCT
 * selection policy and by the robust-child recommendation.
 *
 * OWNERSHIP:
 * - A parent exclusively owns its `children`; nodes are never shared between
 *   branches, so the tree is a strict out-tree
 * - `parent` is a back reference used only to walk the path during
 *   backpropagation and debugging. It is `undefined` at the root
 *
 * ACTION BOOKKEEPING:
 * - `legalActions` is the full enumeration taken once from the state when the
 *   node is created
 * - `untried` holds the indices into `legalActions` not yet expanded. It only
 *   ever shrinks, and together with the children's `actionIndex` values it
 *   covers every legal action exactly once
 */
export type MCTSNode<Action> = {
    /** Problem state at this node */
    state: SearchState<Action>;

    /** Parent node in the search tree, `undefined` at the root */
    parent: MCTSNode<Action> | undefined;

    /** The action that led to this node from its parent */
    lastAction: Action | undefined;

    /** Position of `lastAction` in the parent's `legalActions`, -1 at the root */
    actionIndex: number;

    /** Whether the state is terminal, cached at creation */
    terminal: boolean;

    /** Legal actions of `state`, in enumeration order */
    legalActions: readonly Action[];

    /** Indices into `legalActions` that have no child yet */
    untried: number[];

    /** Expanded children, in expansion order */
    children: MCTSNode<Action>[];

    /** Number of times this node was traversed during backpropagation (N) */
    visits: number;

    /** Cumulative reward from all rollouts passing through this node (W) */
    totalReward: number;
};

function createNode<Action>(
    state: SearchState<Action>,
    parent: MCTSNode<Action> | undefined,
    lastAction: Action | undefined,
    actionIndex: number,
): MCTSNode<Action> {
    const terminal = state.isTerminal();
    const legalActions = terminal ? [] : state.legalActions();

    return {
        state,
        parent,
        lastAction,
        actionIndex,
        terminal,
        legalActions,
        untried: legalActions.map((_, index) => index),
        children: [],
        visits: 0,
        totalReward: 0,
    };
}

export function createRootNode<Action>(state: SearchState<Action>): MCTSNode<Action> {
    return createNode(state, undefined, undefined, -1);
}

/**
 * Creates the child reached from `parent` through `parent.legalActions[actionIndex]`.
 * Does not attach it: the expansion phase owns the parent's bookkeeping.
 */
export function createChildNode<Action>(parent: MCTSNode<Action>, actionIndex: number, state: SearchState<Action>): MCTSNode<Action> {
    return createNode(state, parent, parent.legalActions[actionIndex], actionIndex);
}

export function isFullyExpanded<Action>(node: MCTSNode<Action>): boolean {
    return node.untried.length === 0;
}

export function getUntriedActions<Action>(node: MCTSNode<Action>): Action[] {
    return node.untried.map(index => node.legalActions[index]);
}
