// Export all modular MCTS components
export { MCTS } from './mcts.js';
export { MCTSSelection } from './selection.js';
export { MCTSExpansion } from './expansion.js';
export { MCTSSimulation } from './simulation.js';
export { MCTSBackpropagation } from './backpropagation.js';
export * from '../mcts-types.js';
export * from './mcts-config.js';
