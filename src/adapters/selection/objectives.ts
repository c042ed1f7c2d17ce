import { SelectionObjective } from './selection-node.js';

export function sumObjective<Item>(valueOf: (item: Item) => number): SelectionObjective<Item> {
    return selected => selected.reduce((total, item) => total + valueOf(item), 0);
}

/**
 * Measures how far a selection is from feasible: 0 (or less) when it satisfies
 * the constraint, the size of the overshoot otherwise.
 */
export type ConstraintViolation<Item> = (selected: readonly Item[]) => number;

/**
 * Total weight above `capacity`, knapsack style.
 */
export function capacityViolation<Item>(weightOf: (item: Item) => number, capacity: number): ConstraintViolation<Item> {
    return selected => selected.reduce((total, item) => total + weightOf(item), 0) - capacity;
}

/**
 * Value subject to a feasibility penalty: `objective - penalty * max(0, violation)`.
 */
export function penalizedObjective<Item>(
    objective: SelectionObjective<Item>,
    violation: ConstraintViolation<Item>,
    penalty: number,
): SelectionObjective<Item> {
    return selected => objective(selected) - penalty * Math.max(0, violation(selected));
}
