/**
 * Base class for every error raised by the search engine.
 *
 * All of these are programmer or configuration errors: they are thrown
 * immediately to the caller and never retried by the engine.
 */
export class MCTSError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised for a non-positive iteration count or time budget, a negative
 * exploration constant, or any other malformed search parameter.
 */
export class InvalidConfigurationError extends MCTSError {}

/**
 * Raised when a recommendation is requested from a root that has no expanded
 * children, i.e. before any iteration completed.
 */
export class EmptyTreeError extends MCTSError {
    constructor(message: string = 'Search tree is empty: run at least one iteration before requesting the best action') {
        super(message);
    }
}

/**
 * Raised when expansion is attempted on a terminal node or on a node whose
 * actions have all been expanded already.
 */
export class InvalidExpansionError extends MCTSError {}

/**
 * Raised when a rollout exceeds the configured depth guard without reaching a
 * terminal state. Truncating the rollout instead would feed a non-terminal
 * reward into the tree.
 */
export class RolloutNonTerminationError extends MCTSError {
    constructor(public readonly maxDepth: number) {
        super(`Rollout did not reach a terminal state within ${maxDepth} steps`);
    }
}

/**
 * Raised by search states when asked to apply an action that is not legal, or
 * to score a state that is not terminal.
 */
export class InvalidActionError extends MCTSError {}
