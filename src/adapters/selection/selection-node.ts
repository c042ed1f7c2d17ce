import { InvalidActionError, InvalidConfigurationError } from '../../errors.js';
import type { SearchState } from '../../mcts-types.js';

/**
 * Scores a finished selection. Receives the selected items in pick order.
 */
export type SelectionObjective<Item> = (selected: readonly Item[]) => number;

/**
 * Search state for choosing up to `budget` items from a candidate pool without
 * replacement.
 *
 * An action is the index of a candidate in the original pool. The state holds
 * the indices picked so far (in pick order), the indices still available (in
 * pool order) and the number of picks left. States are immutable: `apply`
 * returns a new node, which is what lets rollouts run on transient copies.
 *
 * Transitions are deterministic; rollouts get their randomness from the
 * rollout policy choosing among the remaining candidates.
 */
export class SelectionNode<Item> implements SearchState<number> {
    private constructor(
        readonly items: readonly Item[],
        readonly selected: readonly number[],
        readonly remaining: readonly number[],
        readonly budget: number,
        private readonly objective: SelectionObjective<Item>,
    ) {}

    /**
     * Root state: nothing selected, every item available.
     *
     * @throws InvalidConfigurationError unless budget is a non-negative integer
     */
    static create<Item>(items: readonly Item[], budget: number, objective: SelectionObjective<Item>): SelectionNode<Item> {
        if (!Number.isInteger(budget) || budget < 0) {
            throw new InvalidConfigurationError(`Selection budget must be a non-negative integer, got ${budget}`);
        }
        return new SelectionNode(items, [], items.map((_, index) => index), budget, objective);
    }

    legalActions(): number[] {
        return this.isTerminal() ? [] : [ ...this.remaining ];
    }

    isTerminal(): boolean {
        return this.budget === 0 || this.remaining.length === 0;
    }

    apply(action: number): SelectionNode<Item> {
        if (this.isTerminal()) {
            throw new InvalidActionError('Cannot select from a finished selection');
        }
        if (!this.remaining.includes(action)) {
            throw new InvalidActionError(`Candidate ${action} is not available`);
        }

        return new SelectionNode(
            this.items,
            [ ...this.selected, action ],
            this.remaining.filter(index => index !== action),
            this.budget - 1,
            this.objective,
        );
    }

    reward(): number {
        if (!this.isTerminal()) {
            throw new InvalidActionError('Reward is only defined once the selection is finished');
        }
        return this.objective(this.selectedItems());
    }

    selectedItems(): Item[] {
        return this.selected.map(index => this.items[index]);
    }
}
