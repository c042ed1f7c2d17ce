import { InvalidActionError, RolloutNonTerminationError } from '../errors.js';
import type { SearchState } from '../mcts-types.js';
import { RolloutPolicy } from '../strategies/rollout-policy.js';
import type { RandomSource } from '../utils/random.js';

/**
 * MCTS Simulation Phase Implementation
 *
 * Plays out the problem from a given state to a terminal state using the
 * rollout policy, and returns the reward found there.
 *
 * Key behaviors:
 * - TRANSIENT: rollout states are never attached to the tree
 * - GUARD: more than `maxDepth` rollout steps raises RolloutNonTerminationError
 *   instead of scoring a non-terminal state
 * - REWARD: `reward()` of the terminal state, as reported by the problem
 */
export class MCTSSimulation<Action> {
    constructor(
        private readonly rolloutPolicy: RolloutPolicy<Action>,
        private readonly random: RandomSource,
        private readonly maxDepth: number,
    ) {}

    simulate(state: SearchState<Action>): number {
        let current = state;
        let depth = 0;

        while (!current.isTerminal()) {
            if (depth >= this.maxDepth) {
                throw new RolloutNonTerminationError(this.maxDepth);
            }

            const actions = current.legalActions();
            if (actions.length === 0) {
                throw new InvalidActionError('Non-terminal state reported no legal actions');
            }

            const action = this.rolloutPolicy.chooseAction(current, actions, this.random);
            current = current.apply(action, this.random);
            depth++;
        }

        return current.reward();
    }
}
