import type { SearchState } from '../mcts-types.js';

/**
 * Generic Decision Strategy Interface
 *
 * Any strategy (MCTS, Random, ...) implements this interface. Strategies are
 * problem-agnostic: they only see states through the `SearchState` contract.
 */
export interface DecisionStrategy<Action> {
    /**
     * Decide which action to take in the given state.
     *
     * @returns The chosen action, or null if the state is terminal
     * @throws InvalidActionError when a non-terminal state has no legal actions
     */
    getAction(state: SearchState<Action>): Action | null;
}
