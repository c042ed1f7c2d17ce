import type { SearchState } from '../mcts-types.js';
import type { RandomSource } from '../utils/random.js';
import { InvalidConfigurationError } from '../errors.js';
import { RolloutPolicy } from './rollout-policy.js';

/**
 * Problem-provided prior for an action. Higher weight = higher probability of
 * selection; zero excludes the action unless every action weighs zero.
 */
export type ActionWeight<Action> = (action: Action, state: SearchState<Action>) => number;

/**
 * Rollout policy sampling actions proportionally to a problem-provided weight.
 *
 * Falls back to a uniform choice when every weight is zero. Negative or
 * non-finite weights are rejected.
 */
export class WeightedRolloutPolicy<Action> implements RolloutPolicy<Action> {
    constructor(private readonly getActionWeight: ActionWeight<Action>) {}

    chooseAction(state: SearchState<Action>, actions: readonly Action[], random: RandomSource): Action {
        if (actions.length === 0) {
            throw new Error('WeightedRolloutPolicy requires at least one action');
        }

        const weights: number[] = [];
        let totalWeight = 0;

        for (const action of actions) {
            const weight = this.getActionWeight(action, state);
            if (!Number.isFinite(weight) || weight < 0) {
                throw new InvalidConfigurationError(`Action weight must be a finite non-negative number, got ${weight}`);
            }
            weights.push(weight);
            totalWeight += weight;
        }

        if (totalWeight === 0) {
            return actions[random.nextInt(actions.length)];
        }

        // Select based on weighted probability
        const randomValue = random.next() * totalWeight;
        let currentWeight = 0;

        for (let i = 0; i < actions.length; i++) {
            currentWeight += weights[i];
            if (randomValue < currentWeight) {
                return actions[i];
            }
        }

        // Rounding can leave randomValue a hair above the final running sum
        let last = actions.length - 1;
        while (weights[last] === 0) {
            last--;
        }
        return actions[last];
    }
}
