import { InvalidActionError, RolloutNonTerminationError } from '../errors.js';
import type { SearchState } from '../mcts-types.js';
import type { RandomSource } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';

export type PlayOutResult<Action> = {
    /** Actions committed, in order */
    actions: Action[];
    finalState: SearchState<Action>;
    reward: number;
};

/**
 * Drives a whole decision episode: asks the strategy for an action, commits it,
 * and repeats from the resulting state until a terminal state is reached.
 *
 * @throws InvalidActionError when the strategy has no action for a non-terminal state
 * @throws RolloutNonTerminationError after `maxSteps` decisions without reaching a terminal state
 */
export function playOut<Action>(
    strategy: DecisionStrategy<Action>,
    initialState: SearchState<Action>,
    random: RandomSource,
    maxSteps: number = 1000,
): PlayOutResult<Action> {
    const actions: Action[] = [];
    let state = initialState;

    while (!state.isTerminal()) {
        if (actions.length >= maxSteps) {
            throw new RolloutNonTerminationError(maxSteps);
        }

        const action = strategy.getAction(state);
        if (action === null) {
            throw new InvalidActionError('Strategy returned no action for a non-terminal state');
        }

        actions.push(action);
        state = state.apply(action, random);
    }

    return { actions, finalState: state, reward: state.reward() };
}
