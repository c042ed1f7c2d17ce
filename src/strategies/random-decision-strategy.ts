import { InvalidActionError } from '../errors.js';
import type { SearchState } from '../mcts-types.js';
import type { RandomSource } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';
import { RolloutPolicy } from './rollout-policy.js';
import { UniformRolloutPolicy } from './uniform-rollout-policy.js';

/**
 * Random Decision Strategy
 *
 * Commits to whatever the rollout policy picks, without searching.
 *
 * Used for:
 * - Baseline comparison (MCTS vs Random)
 * - Testing
 */
export class RandomDecisionStrategy<Action> implements DecisionStrategy<Action> {
    constructor(
        private readonly random: RandomSource,
        private readonly policy: RolloutPolicy<Action> = new UniformRolloutPolicy<Action>(),
    ) {}

    getAction(state: SearchState<Action>): Action | null {
        if (state.isTerminal()) {
            return null;
        }

        const legalActions = state.legalActions();

        if (legalActions.length === 0) {
            throw new InvalidActionError('Non-terminal state reported no legal actions');
        }

        if (legalActions.length === 1) {
            return legalActions[0];
        }

        return this.policy.chooseAction(state, legalActions, this.random);
    }
}
