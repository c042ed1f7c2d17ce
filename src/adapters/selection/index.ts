export { SelectionNode } from './selection-node.js';
export type { SelectionObjective } from './selection-node.js';
export { sumObjective, capacityViolation, penalizedObjective } from './objectives.js';
export type { ConstraintViolation } from './objectives.js';
export { planSelection } from './plan-selection.js';
export type { SelectionPlan, PlanSelectionOptions } from './plan-selection.js';
