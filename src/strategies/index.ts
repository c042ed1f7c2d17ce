export type { DecisionStrategy } from './decision-strategy.js';
export { MCTSDecisionStrategy } from './mcts-decision-strategy.js';
export { RandomDecisionStrategy } from './random-decision-strategy.js';
export type { RolloutPolicy } from './rollout-policy.js';
export { UniformRolloutPolicy } from './uniform-rollout-policy.js';
export { WeightedRolloutPolicy } from './weighted-rollout-policy.js';
export type { ActionWeight } from './weighted-rollout-policy.js';
export { playOut } from './play-out.js';
export type { PlayOutResult } from './play-out.js';
