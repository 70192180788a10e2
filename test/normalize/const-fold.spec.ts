import { expect } from 'chai';
import { and, binary, call, col, gt, lit, not, or, unary } from '../../src/ast/build.js';
import { foldConstants } from '../../src/normalize/const-fold.js';

describe('foldConstants', () => {
	it('folds arithmetic over literals', () => {
		expect(foldConstants(binary('+', lit(1), binary('*', lit(2), lit(3))))).to.deep.equal(lit(7));
		expect(foldConstants(binary('||', lit('ab'), lit(1)))).to.deep.equal(lit('ab1'));
	});

	it('folds comparisons of same-typed literals', () => {
		expect(foldConstants(gt(lit(3), lit(2)))).to.deep.equal(lit(true));
		expect(foldConstants(binary('=', lit('a'), lit('b')))).to.deep.equal(lit(false));
	});

	it('leaves division by zero and mixed-type comparisons alone', () => {
		const division = binary('/', lit(1), lit(0));
		expect(foldConstants(division)).to.equal(division);
		const mixed = gt(lit('a'), lit(1));
		expect(foldConstants(mixed)).to.equal(mixed);
	});

	it('folds division only where every backend agrees on the result', () => {
		expect(foldConstants(binary('/', lit(8), lit(2)))).to.deep.equal(lit(4));
		expect(foldConstants(binary('/', lit(7.5), lit(2)))).to.deep.equal(lit(3.75));
		expect(foldConstants(binary('%', lit(7), lit(2)))).to.deep.equal(lit(1));
		const integerDivision = binary('/', lit(7), lit(2));
		expect(foldConstants(integerDivision)).to.equal(integerDivision);
		const realModulo = binary('%', lit(7.5), lit(2));
		expect(foldConstants(realModulo)).to.equal(realModulo);
	});

	it('propagates null through arithmetic', () => {
		expect(foldConstants(binary('-', lit(null), lit(4)))).to.deep.equal(lit(null));
		expect(foldConstants(unary('IS NULL', lit(null)))).to.deep.equal(lit(true));
	});

	it('applies three-valued boolean identities', () => {
		expect(foldConstants(and(col('a'), lit(true)))).to.deep.equal(col('a'));
		expect(foldConstants(and(col('a'), lit(false)))).to.deep.equal(lit(false));
		expect(foldConstants(or(lit(false), col('a')))).to.deep.equal(col('a'));
		expect(foldConstants(or(col('a'), lit(true)))).to.deep.equal(lit(true));
		const unknown = and(col('a'), lit(null));
		expect(foldConstants(unknown)).to.equal(unknown);
	});

	it('removes double negation', () => {
		expect(foldConstants(not(not(col('flag'))))).to.deep.equal(col('flag'));
		expect(foldConstants(not(lit(true)))).to.deep.equal(lit(false));
	});

	it('folds known scalar functions and leaves others', () => {
		expect(foldConstants(call('UPPER', lit('nl')))).to.deep.equal(lit('NL'));
		expect(foldConstants(call('abs', binary('-', lit(2), lit(5))))).to.deep.equal(lit(3));
		expect(foldConstants(call('session_bucket', col('ts'), binary('*', lit(3), lit(10)))))
			.to.deep.equal(call('session_bucket', col('ts'), lit(30)));
	});

	it('returns the same node when nothing folds', () => {
		const expr = binary('+', col('a'), col('b'));
		expect(foldConstants(expr)).to.equal(expr);
	});
});
