import { expect } from 'chai';
import { InvalidExpansionError } from '../../../src/errors.js';
import { MCTSExpansion } from '../../../src/modular/expansion.js';
import { createRootNode, getUntriedActions } from '../../../src/mcts-node.js';
import type { SearchState } from '../../../src/mcts-types.js';
import { createSeededRandom } from '../../../src/utils/random.js';
import { attachChild, createRootWithStats } from '../../helpers/node-factory.js';
import { ScriptedRandom } from '../../helpers/scripted-random.js';
import { DigitState } from '../../helpers/test-states.js';

describe('MCTSExpansion Scenarios', () => {
    it('should expand untried actions in enumeration order by default', () => {
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootNode(new DigitState(3, 2));

        const first = expansion.expand(root);
        const second = expansion.expand(root);

        expect(first.actionIndex).to.equal(0);
        expect(second.actionIndex).to.equal(1);
        expect(root.untried).to.deep.equal([ 2 ]);
        expect(getUntriedActions(root)).to.deep.equal([ 2 ]);
        expect(root.children).to.have.length(2);
        expect(root.children[0]).to.equal(first);
        expect(root.children[1]).to.equal(second);
    });

    it('should create the child with empty statistics and a parent link', () => {
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootWithStats(new DigitState(3, 2), 4, 6);

        const child = expansion.expand(root);

        expect(child.visits).to.equal(0);
        expect(child.totalReward).to.equal(0);
        expect(child.parent).to.equal(root);
        expect(child.lastAction).to.equal(0);
        expect(child.children).to.deep.equal([]);
        expect(child.untried).to.deep.equal([ 0, 1, 2 ]);
        expect(child.state).to.deep.equal(new DigitState(3, 1, [ 0 ]));
    });

    it('should draw the untried action from the random source under the random policy', () => {
        const random = new ScriptedRandom([ 0.9 ]);
        const expansion = new MCTSExpansion<number>('random', random);
        const root = createRootNode(new DigitState(3, 2));

        const child = expansion.expand(root);

        // floor(0.9 * 3) = 2
        expect(child.actionIndex).to.equal(2);
        expect(root.untried).to.deep.equal([ 0, 1 ]);
        expect(random.draws).to.equal(1);
    });

    it('should not draw from the random source under the first policy', () => {
        const random = new ScriptedRandom([ 0.9 ]);
        const expansion = new MCTSExpansion<number>('first', random);

        expansion.expand(createRootNode(new DigitState(3, 2)));

        expect(random.draws).to.equal(0);
    });

    it('should mark a child terminal when its state is terminal', () => {
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootNode(new DigitState(2, 1));

        const child = expansion.expand(root);

        expect(child.terminal).to.equal(true);
        expect(child.legalActions).to.deep.equal([]);
        expect(child.untried).to.deep.equal([]);
    });

    it('should throw InvalidExpansionError on a terminal node', () => {
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootNode(new DigitState(3, 0));

        expect(() => expansion.expand(root)).to.throw(InvalidExpansionError, 'Cannot expand a terminal node');
    });

    it('should throw InvalidExpansionError on a fully expanded node', () => {
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootWithStats(new DigitState(2, 2));
        attachChild(root, 0);
        attachChild(root, 1);

        expect(() => expansion.expand(root)).to.throw(InvalidExpansionError, 'Cannot expand a node with no untried actions');
    });

    it('should leave the node unchanged when the transition throws', () => {
        const failing: SearchState<number> = {
            legalActions: () => [ 0 ],
            isTerminal: () => false,
            apply: () => {
                throw new Error('transition failed');
            },
            reward: () => 0,
        };
        const expansion = new MCTSExpansion<number>('first', createSeededRandom(1));
        const root = createRootNode(failing);

        expect(() => expansion.expand(root)).to.throw('transition failed');
        expect(root.untried).to.deep.equal([ 0 ]);
        expect(root.children).to.deep.equal([]);
    });
});
