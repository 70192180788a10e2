import { expect } from 'chai';
import {
	AmbiguousSchemaError, CyclicDependencyError, DivergentMaterializationError, formatErrorChain, isRecoverable,
	MisuseError, OptimizerError, RuleNonterminatingError, UnresolvedReferenceError,
} from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';
import { disableLogging, enableLogging, isLoggingEnabled } from '../../src/common/logger.js';

describe('optimizer errors', () => {
	it('separates recoverable errors from fatal ones', () => {
		expect(isRecoverable(new AmbiguousSchemaError('x', 'k', ['a', 'b']))).to.equal(true);
		expect(isRecoverable(new RuleNonterminatingError(4))).to.equal(true);
		expect(isRecoverable(new DivergentMaterializationError('m', 's'))).to.equal(true);
		expect(isRecoverable(new CyclicDependencyError(['a', 'a']))).to.equal(false);
		expect(isRecoverable(new UnresolvedReferenceError('m', 'x'))).to.equal(false);
		expect(isRecoverable(new Error('plain'))).to.equal(false);
	});

	it('keeps subclass identity and status codes', () => {
		const error = new MisuseError('bad call');
		expect(error).to.be.instanceOf(MisuseError);
		expect(error).to.be.instanceOf(OptimizerError);
		expect(error.code).to.equal(StatusCode.MISUSE);
		expect(error.name).to.equal('MisuseError');
		expect(new RuleNonterminatingError(4).message).to.equal('Rule application did not reach a fixpoint within 4 iterations');
	});

	it('formats a cause chain', () => {
		const root = new Error('disk full');
		const wrapped = new OptimizerError('could not load stats', StatusCode.ERROR, root);
		expect(formatErrorChain(wrapped)).to.equal('OptimizerError: could not load stats\n  Error: disk full');
		expect(formatErrorChain('text')).to.equal('text');
	});
});

describe('logging', () => {
	afterEach(() => disableLogging());

	it('toggles namespaces', () => {
		enableLogging('sharedquery:cse:*', () => undefined);
		expect(isLoggingEnabled('cse:detector')).to.equal(true);
		expect(isLoggingEnabled('tracker')).to.equal(false);
		disableLogging();
		expect(isLoggingEnabled('cse:detector')).to.equal(false);
	});
});
