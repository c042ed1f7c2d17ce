import type { StopCondition } from '../../mcts-types.js';
import { MCTSOptions } from '../../modular/mcts-config.js';
import { MCTSDecisionStrategy } from '../../strategies/mcts-decision-strategy.js';
import { playOut } from '../../strategies/play-out.js';
import { SelectionNode, SelectionObjective } from './selection-node.js';

export type SelectionPlan<Item> = {
    /** Pool indices, in the order they were committed */
    indices: number[];
    items: Item[];
    /** Objective value of the final selection */
    value: number;
};

export type PlanSelectionOptions = MCTSOptions<number> & {
    /** Search effort spent on each pick */
    stop?: StopCondition;
};

/**
 * Builds a complete selection one pick at a time: every pick runs a fresh
 * search from the current partial selection and commits the robust child.
 */
export function planSelection<Item>(
    items: readonly Item[],
    budget: number,
    objective: SelectionObjective<Item>,
    options: PlanSelectionOptions = {},
): SelectionPlan<Item> {
    const { stop, ...searchOptions } = options;
    const strategy = new MCTSDecisionStrategy<number>(searchOptions, stop);
    const root = SelectionNode.create(items, budget, objective);

    const picks = Math.min(budget, items.length);
    const { actions, reward } = playOut(strategy, root, strategy.searchConfig.random, picks);

    return {
        indices: actions,
        items: actions.map(index => items[index]),
        value: reward,
    };
}
