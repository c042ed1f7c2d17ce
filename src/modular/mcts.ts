import { EmptyTreeError } from '../errors.js';
import { MCTSNode, createRootNode } from '../mcts-node.js';
import type { ActionStatistics, SearchState, StopCondition } from '../mcts-types.js';
import { calculateAvgScore, compareRobust } from '../utils/mcts-node-utils.js';
import { ActionFormatter, formatActionAsJson, printTree } from '../utils/tree-debug.js';
import { MCTSBackpropagation } from './backpropagation.js';
import { MCTSExpansion } from './expansion.js';
import { MCTSConfig, MCTSOptions, resolveConfig, validateStopCondition } from './mcts-config.js';
import { MCTSSelection } from './selection.js';
import { MCTSSimulation } from './simulation.js';

/**
 * Monte-Carlo Tree Search driver.
 *
 * Owns one search tree, built fresh from the state passed to the constructor,
 * and runs the four-phase loop over it:
 *
 * 1. SELECTION: descend from the root with UCT while nodes are fully expanded
 * 2. EXPANSION: add one child for an untried action (skipped at terminal nodes)
 * 3. SIMULATION: roll out from the new child to a terminal state
 * 4. BACKPROPAGATION: add the reward to every node from the child up to the root
 *
 * Iterations run strictly one after another. The tree is only ever mutated by
 * this class, and all randomness comes from the configured random source, so
 * two searches from the same state with the same seed build identical trees.
 *
 * Set MCTS_DEBUG_TREE=true to print the tree after every `run`, and
 * LOG_MCTS_SCORES=true to print the top root actions on every `bestAction`.
 */
export class MCTS<Action> {
    private readonly config: MCTSConfig<Action>;

    private readonly root: MCTSNode<Action>;

    private selection: MCTSSelection<Action>;

    private expansion: MCTSExpansion<Action>;

    private simulation: MCTSSimulation<Action>;

    private backpropagation: MCTSBackpropagation<Action>;

    private completedIterations = 0;

    constructor(
        rootState: SearchState<Action>,
        options: MCTSOptions<Action> = {},
        private readonly formatAction: ActionFormatter<Action> = formatActionAsJson,
    ) {
        this.config = resolveConfig(options);
        this.root = createRootNode(rootState);

        this.selection = new MCTSSelection(this.config.explorationConstant);
        this.expansion = new MCTSExpansion(this.config.expansionPolicy, this.config.random);
        this.simulation = new MCTSSimulation(this.config.rolloutPolicy, this.config.random, this.config.maxRolloutDepth);
        this.backpropagation = new MCTSBackpropagation();
    }

    /** Iterations completed over the lifetime of this search */
    get iterationsRun(): number {
        return this.completedIterations;
    }

    getRoot(): MCTSNode<Action> {
        return this.root;
    }

    /**
     * Runs iterations until the stop condition is met.
     *
     * A time budget is only checked between iterations; an iteration in
     * progress always completes.
     *
     * @returns The number of iterations completed by this call
     * @throws InvalidConfigurationError for a non-positive iteration count or time budget
     * @throws InvalidExpansionError when the root state is terminal
     * @throws RolloutNonTerminationError when a rollout exceeds the depth guard
     */
    run(stop: StopCondition): number {
        validateStopCondition(stop);
        const before = this.completedIterations;

        if ('iterations' in stop) {
            for (let i = 0; i < stop.iterations; i++) {
                this.runSingleIteration();
            }
        } else {
            const deadline = this.config.now() + stop.timeMs;
            while (this.config.now() < deadline) {
                this.runSingleIteration();
            }
        }

        if (process.env.MCTS_DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(this.root, this.formatAction);
        }

        return this.completedIterations - before;
    }

    /**
     * Recommended action at the root: the robust child, i.e. the most visited
     * one, with ties going to the higher mean reward and then to enumeration order.
     *
     * @throws EmptyTreeError when no iteration has expanded the root yet
     */
    bestAction(): Action {
        const actions = this.getActions();

        if (process.env.LOG_MCTS_SCORES === 'true') {
            console.log(`[MCTS] ${actions.length} actions evaluated over ${this.completedIterations} iterations:`);
            actions.slice(0, 5).forEach((a, i) => {
                console.log(`  ${i + 1}. ${this.formatAction(a.action)} | score=${a.score.toFixed(4)} | visits=${a.visits}`);
            });
        }

        return actions[0].action;
    }

    /**
     * Statistics for every expanded root action, best first by the robust-child order.
     *
     * @throws EmptyTreeError when the root has no children
     */
    getActions(): ActionStatistics<Action>[] {
        if (this.root.children.length === 0) {
            throw new EmptyTreeError();
        }

        return [ ...this.root.children ].sort(compareRobust).map(child => ({
            action: this.root.legalActions[child.actionIndex],
            actionIndex: child.actionIndex,
            visits: child.visits,
            score: calculateAvgScore(child),
        }));
    }

    private runSingleIteration(): void {
        // SELECTION: stops at a terminal node or one with untried actions
        const selectedNode = this.selection.select(this.root);

        if (selectedNode.terminal && selectedNode !== this.root) {
            // Terminal leaf: its own reward is the outcome, nothing to expand or roll out
            this.backpropagation.backpropagate(selectedNode, selectedNode.state.reward());
            this.completedIterations++;
            return;
        }

        // EXPANSION: throws InvalidExpansionError for a terminal root
        const expandedNode = this.expansion.expand(selectedNode);

        // SIMULATION
        const reward = this.simulation.simulate(expandedNode.state);

        // BACKPROPAGATION
        this.backpropagation.backpropagate(expandedNode, reward);
        this.completedIterations++;
    }
}
