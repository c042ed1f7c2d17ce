import { expect } from 'chai';
import { InvalidActionError, InvalidConfigurationError } from '../../../src/errors.js';
import { SelectionNode } from '../../../src/adapters/selection/selection-node.js';
import { sumObjective } from '../../../src/adapters/selection/objectives.js';

describe('SelectionNode', () => {
    const values = [ 5, 3, 8 ];
    const objective = sumObjective((value: number) => value);

    it('should start with nothing selected and every candidate available', () => {
        const root = SelectionNode.create(values, 2, objective);

        expect(root.selected).to.deep.equal([]);
        expect(root.remaining).to.deep.equal([ 0, 1, 2 ]);
        expect(root.budget).to.equal(2);
        expect(root.isTerminal()).to.equal(false);
        expect(root.legalActions()).to.deep.equal([ 0, 1, 2 ]);
    });

    it('should move the candidate from the pool to the selection', () => {
        const root = SelectionNode.create(values, 2, objective);

        const next = root.apply(1);

        expect(next.selected).to.deep.equal([ 1 ]);
        expect(next.remaining).to.deep.equal([ 0, 2 ]);
        expect(next.budget).to.equal(1);
        expect(next.legalActions()).to.deep.equal([ 0, 2 ]);
    });

    it('should not mutate the state it was applied to', () => {
        const root = SelectionNode.create(values, 2, objective);

        root.apply(1);

        expect(root.selected).to.deep.equal([]);
        expect(root.remaining).to.deep.equal([ 0, 1, 2 ]);
        expect(root.budget).to.equal(2);
    });

    it('should become terminal when the budget is spent', () => {
        const done = SelectionNode.create(values, 2, objective).apply(2).apply(0);

        expect(done.isTerminal()).to.equal(true);
        expect(done.legalActions()).to.deep.equal([]);
        expect(done.selectedItems()).to.deep.equal([ 8, 5 ]);
        expect(done.reward()).to.equal(13);
    });

    it('should become terminal when the pool is empty', () => {
        const done = SelectionNode.create([ 4, 6 ], 5, objective).apply(0).apply(1);

        expect(done.budget).to.equal(3);
        expect(done.isTerminal()).to.equal(true);
        expect(done.reward()).to.equal(10);
    });

    it('should treat a zero budget as terminal from the start', () => {
        const root = SelectionNode.create(values, 0, objective);

        expect(root.isTerminal()).to.equal(true);
        expect(root.legalActions()).to.deep.equal([]);
        expect(root.reward()).to.equal(0);
    });

    it('should pass the selected items in pick order to the objective', () => {
        const seen: number[][] = [];
        const root = SelectionNode.create(values, 2, selected => {
            seen.push([ ...selected ]);
            return selected.length;
        });

        expect(root.apply(2).apply(1).reward()).to.equal(2);
        expect(seen).to.deep.equal([[ 8, 3 ]]);
    });

    it('should reject an unavailable candidate', () => {
        const next = SelectionNode.create(values, 2, objective).apply(1);

        expect(() => next.apply(1)).to.throw(InvalidActionError, 'Candidate 1 is not available');
        expect(() => next.apply(7)).to.throw(InvalidActionError, 'Candidate 7 is not available');
    });

    it('should reject applying to a finished selection', () => {
        const done = SelectionNode.create(values, 1, objective).apply(0);

        expect(() => done.apply(1)).to.throw(InvalidActionError, 'Cannot select from a finished selection');
    });

    it('should reject scoring an unfinished selection', () => {
        const root = SelectionNode.create(values, 1, objective);

        expect(() => root.reward()).to.throw(InvalidActionError, 'Reward is only defined once the selection is finished');
    });

    it('should reject a negative or fractional budget', () => {
        expect(() => SelectionNode.create(values, -1, objective))
            .to.throw(InvalidConfigurationError, 'Selection budget must be a non-negative integer, got -1');
        expect(() => SelectionNode.create(values, 1.5, objective))
            .to.throw(InvalidConfigurationError, 'Selection budget must be a non-negative integer, got 1.5');
    });
});
