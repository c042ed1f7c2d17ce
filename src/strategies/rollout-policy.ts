import type { SearchState } from '../mcts-types.js';
import type { RandomSource } from '../utils/random.js';

/**
 * Default policy used during the simulation phase.
 *
 * Picks one of the (non-empty) legal actions of a transient rollout state.
 * Implementations must draw randomness only from `random` so rollouts stay
 * reproducible under a fixed seed.
 */
export interface RolloutPolicy<Action> {
    chooseAction(state: SearchState<Action>, actions: readonly Action[], random: RandomSource): Action;
}
