import { expect } from 'chai';
import { canTransition, transition } from '../../src/tracker/lifecycle.js';
import { MisuseError } from '../../src/common/errors.js';

describe('shared computation lifecycle', () => {
	it('allows the documented transitions', () => {
		expect(canTransition('candidate', 'active')).to.equal(true);
		expect(canTransition('active', 'evolving')).to.equal(true);
		expect(canTransition('evolving', 'active')).to.equal(true);
		expect(canTransition('active', 'dissolved')).to.equal(true);
		expect(canTransition('evolving', 'dissolved')).to.equal(true);
	});

	it('rejects everything else', () => {
		expect(canTransition('candidate', 'evolving')).to.equal(false);
		expect(canTransition('dissolved', 'active')).to.equal(false);
		expect(canTransition('active', 'active')).to.equal(false);
		expect(() => transition('dissolved', 'active')).to.throw(MisuseError, 'Illegal shared computation transition dissolved -> active');
		expect(transition('candidate', 'active')).to.equal('active');
	});
});
