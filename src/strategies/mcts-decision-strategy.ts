import { InvalidActionError } from '../errors.js';
import type { SearchState, StopCondition } from '../mcts-types.js';
import { MCTS } from '../modular/mcts.js';
import { DEFAULT_STOP_CONDITION, MCTSConfig, MCTSOptions, resolveConfig } from '../modular/mcts-config.js';
import { ActionFormatter, formatActionAsJson } from '../utils/tree-debug.js';
import { DecisionStrategy } from './decision-strategy.js';

/**
 * MCTS Decision Strategy
 *
 * Runs a Monte-Carlo Tree Search for every decision and commits to the robust
 * child. Each call builds a fresh tree from the given state; nothing from an
 * earlier decision is reused.
 *
 * The configuration is resolved once, so consecutive decisions keep drawing
 * from the same random source instead of replaying one seed.
 */
export class MCTSDecisionStrategy<Action> implements DecisionStrategy<Action> {
    private readonly config: MCTSConfig<Action>;

    constructor(
        options: MCTSOptions<Action> = {},
        private readonly stop: StopCondition = DEFAULT_STOP_CONDITION,
        private readonly formatAction: ActionFormatter<Action> = formatActionAsJson,
    ) {
        this.config = resolveConfig(options);
    }

    getAction(state: SearchState<Action>): Action | null {
        if (state.isTerminal()) {
            return null;
        }

        // Check for only one legal action - return immediately
        const legalActions = state.legalActions();

        if (legalActions.length === 0) {
            throw new InvalidActionError('Non-terminal state reported no legal actions');
        }

        if (legalActions.length === 1) {
            return legalActions[0];
        }

        // Multiple legal actions - run MCTS to find best one
        const search = new MCTS(state, this.config, this.formatAction);
        search.run(this.stop);
        return search.bestAction();
    }

    get searchConfig(): Readonly<MCTSConfig<Action>> {
        return this.config;
    }
}
