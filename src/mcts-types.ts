import type { RandomSource } from './utils/random.js';

/**
 * Capability contract every problem-specific state must satisfy.
 *
 * This is the sole extension point of the engine: the search never inspects a
 * state beyond these four operations, and concrete problems (see
 * `SelectionNode`) implement the interface directly.
 *
 * - legalActions(): every action applicable here; empty iff the state is terminal
 * - isTerminal(): whether the decision process has ended
 * - apply(): the successor state. Transitions may be stochastic, in which case
 *   they must draw only from the supplied random source
 * - reward(): outcome from the decision-maker's perspective; only defined on
 *   terminal states
 */
export interface SearchState<Action> {
    legalActions(): Action[];
    isTerminal(): boolean;
    apply(action: Action, random: RandomSource): SearchState<Action>;
    reward(): number;
}

/**
 * When `MCTS.run` stops: after a fixed number of iterations, or once a
 * wall-clock budget in milliseconds has elapsed (checked between iterations).
 */
export type StopCondition = { iterations: number } | { timeMs: number };

/**
 * Root-level statistics for one expanded action.
 */
export type ActionStatistics<Action> = {
    action: Action;
    /** Position of the action in the root's legal-action enumeration */
    actionIndex: number;
    visits: number;
    /** Mean reward (Q) */
    score: number;
};
