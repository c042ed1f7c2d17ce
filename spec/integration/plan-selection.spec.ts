import { expect } from 'chai';
import { capacityViolation, penalizedObjective, sumObjective } from '../../src/adapters/selection/objectives.js';
import { planSelection } from '../../src/adapters/selection/plan-selection.js';
import { InvalidConfigurationError } from '../../src/errors.js';

type Item = { name: string, value: number, weight: number };

describe('planSelection', () => {
    const items: Item[] = [
        { name: 'tent', value: 9, weight: 4 },
        { name: 'stove', value: 7, weight: 3 },
        { name: 'lamp', value: 4, weight: 2 },
        { name: 'chair', value: 3, weight: 3 },
    ];
    const value = sumObjective((item: Item) => item.value);
    const objective = penalizedObjective(value, capacityViolation((item: Item) => item.weight, 6), 100);

    it('should pick the best feasible pair under a capacity penalty', () => {
        const plan = planSelection(items, 2, objective, { seed: 7, stop: { iterations: 100 } });

        expect(plan.indices).to.deep.equal([ 2, 0 ]);
        expect(plan.items.map(item => item.name)).to.deep.equal([ 'lamp', 'tent' ]);
        expect(plan.value).to.equal(13);
    });

    it('should complete the optimal sum selection', () => {
        const plan = planSelection([ 5, 3, 8, 1 ], 2, sumObjective((item: number) => item), { seed: 11, stop: { iterations: 50 } });

        expect(plan.indices).to.deep.equal([ 2, 0 ]);
        expect(plan.value).to.equal(13);
    });

    it('should take the whole pool when the budget exceeds it', () => {
        const plan = planSelection([ 2, 6 ], 5, sumObjective((item: number) => item), { seed: 1 });

        expect([ ...plan.indices ].sort()).to.deep.equal([ 0, 1 ]);
        expect(plan.value).to.equal(8);
    });

    it('should allow selections longer than the default step guard', function () {
        this.timeout(30000);
        const pool = Array.from({ length: 1002 }, () => 1);

        const plan = planSelection(pool, 1001, sumObjective((item: number) => item), { seed: 1, stop: { iterations: 1 }, maxRolloutDepth: 5000 });

        expect(plan.indices).to.have.length(1001);
        expect(new Set(plan.indices).size).to.equal(1001);
        expect(plan.value).to.equal(1001);
    });

    it('should return an empty plan for a zero budget', () => {
        const plan = planSelection(items, 0, objective, { seed: 1 });

        expect(plan.indices).to.deep.equal([]);
        expect(plan.items).to.deep.equal([]);
        expect(plan.value).to.equal(0);
    });

    it('should reject an invalid stop condition on the first search', () => {
        expect(() => planSelection(items, 2, objective, { seed: 1, stop: { iterations: 0 } }))
            .to.throw(InvalidConfigurationError, 'Iteration count must be a positive integer, got 0');
    });
});
