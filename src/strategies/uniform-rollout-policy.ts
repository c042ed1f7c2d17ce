import type { SearchState } from '../mcts-types.js';
import type { RandomSource } from '../utils/random.js';
import { RolloutPolicy } from './rollout-policy.js';

/**
 * Chooses uniformly at random among the legal actions. The engine's default.
 */
export class UniformRolloutPolicy<Action> implements RolloutPolicy<Action> {
    chooseAction(_state: SearchState<Action>, actions: readonly Action[], random: RandomSource): Action {
        if (actions.length === 0) {
            throw new Error('UniformRolloutPolicy requires at least one action');
        }
        return actions[random.nextInt(actions.length)];
    }
}
