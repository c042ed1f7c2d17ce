import { InvalidConfigurationError } from '../errors.js';
import type { StopCondition } from '../mcts-types.js';
import { RolloutPolicy } from '../strategies/rollout-policy.js';
import { UniformRolloutPolicy } from '../strategies/uniform-rollout-policy.js';
import { DEFAULT_EXPLORATION_CONSTANT } from '../utils/mcts-node-utils.js';
import { RandomSource, createSeededRandom, mathRandom } from '../utils/random.js';

/**
 * How the expansion phase picks among a node's untried actions:
 * - 'first': the first untried action in enumeration order
 * - 'random': uniformly among the untried actions, drawn from the search's random source
 */
export type ExpansionPolicy = 'first' | 'random';

export interface MCTSParams {
    /** Weight of the UCT exploration term (c), must be finite and non-negative */
    explorationConstant: number;
    /** Rollout steps allowed before a rollout counts as non-terminating */
    maxRolloutDepth: number;
    expansionPolicy: ExpansionPolicy;
}

export const DEFAULT_MCTS_PARAMS: MCTSParams = {
    explorationConstant: DEFAULT_EXPLORATION_CONSTANT,
    maxRolloutDepth: 1000,
    expansionPolicy: 'first',
};

export const DEFAULT_STOP_CONDITION: StopCondition = { iterations: 100 };

export interface MCTSConfig<Action> extends MCTSParams {
    rolloutPolicy: RolloutPolicy<Action>;
    random: RandomSource;
    /** Millisecond clock consulted by time-budgeted runs */
    now: () => number;
}

/**
 * Caller-facing options. Anything omitted or `undefined` takes its default; `seed` is a
 * shorthand for `random: createSeededRandom(seed)`.
 */
export type MCTSOptions<Action> = Partial<MCTSConfig<Action>> & { seed?: number | string };

/**
 * Merges options over the defaults and validates the result.
 *
 * @throws InvalidConfigurationError for a negative or non-finite exploration
 * constant, a non-positive rollout depth guard, an unknown expansion policy,
 * or when both `seed` and `random` are given
 */
export function resolveConfig<Action>(options: MCTSOptions<Action> = {}): MCTSConfig<Action> {
    const { seed, random, rolloutPolicy, now, explorationConstant, maxRolloutDepth, expansionPolicy } = options;

    if (seed !== undefined && random !== undefined) {
        throw new InvalidConfigurationError('Pass either a seed or a random source, not both');
    }

    const config: MCTSConfig<Action> = {
        explorationConstant: explorationConstant ?? DEFAULT_MCTS_PARAMS.explorationConstant,
        maxRolloutDepth: maxRolloutDepth ?? DEFAULT_MCTS_PARAMS.maxRolloutDepth,
        expansionPolicy: expansionPolicy ?? DEFAULT_MCTS_PARAMS.expansionPolicy,
        rolloutPolicy: rolloutPolicy ?? new UniformRolloutPolicy<Action>(),
        random: random ?? (seed !== undefined ? createSeededRandom(seed) : mathRandom),
        now: now ?? (() => performance.now()),
    };

    if (!Number.isFinite(config.explorationConstant) || config.explorationConstant < 0) {
        throw new InvalidConfigurationError(`Exploration constant must be a finite non-negative number, got ${config.explorationConstant}`);
    }
    if (!Number.isInteger(config.maxRolloutDepth) || config.maxRolloutDepth <= 0) {
        throw new InvalidConfigurationError(`maxRolloutDepth must be a positive integer, got ${config.maxRolloutDepth}`);
    }
    if (config.expansionPolicy !== 'first' && config.expansionPolicy !== 'random') {
        throw new InvalidConfigurationError(`Unknown expansion policy: ${String(config.expansionPolicy)}`);
    }

    return config;
}

/**
 * @throws InvalidConfigurationError unless the condition is a positive integer
 * iteration count or a positive, finite time budget
 */
export function validateStopCondition(stop: StopCondition): void {
    if ('iterations' in stop) {
        if (!Number.isInteger(stop.iterations) || stop.iterations <= 0) {
            throw new InvalidConfigurationError(`Iteration count must be a positive integer, got ${stop.iterations}`);
        }
        return;
    }
    if (!Number.isFinite(stop.timeMs) || stop.timeMs <= 0) {
        throw new InvalidConfigurationError(`Time budget must be a positive number of milliseconds, got ${stop.timeMs}`);
    }
}
