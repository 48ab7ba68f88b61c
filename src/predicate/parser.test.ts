import { describe, it, expect } from 'vitest';
import { QuerySyntaxError } from '../errors';
import { parsePredicate } from './parser';
import { tokenizeClause } from './tokenizer';
import { describePredicate, predicateColumns } from './types';

describe('tokenizeClause', () =>
{
	it('should produce typed tokens with offsets', () =>
	{
		expect(tokenizeClause("age >= 18 AND name = 'O''Hara'")).toEqual([
			{ kind: 'word', text: 'age', start: 0, end: 3 },
			{ kind: 'operator', text: '>=', start: 4, end: 6 },
			{ kind: 'number', text: '18', value: 18, start: 7, end: 9 },
			{ kind: 'word', text: 'AND', start: 10, end: 13 },
			{ kind: 'word', text: 'name', start: 14, end: 18 },
			{ kind: 'operator', text: '=', start: 19, end: 20 },
			{ kind: 'string', text: "'O''Hara'", value: "O'Hara", start: 21, end: 30 }
		]);
	});

	it('should split operators glued to operands', () =>
	{
		expect(tokenizeClause('a<>-2').map(t => t.text)).toEqual(['a', '<>', '-2']);
		expect(tokenizeClause('x IN (1,2)').map(t => t.kind)).toEqual(['word', 'word', 'lparen', 'number', 'comma', 'number', 'rparen']);
	});

	it('should reject unterminated strings and a lone bang', () =>
	{
		expect(() => tokenizeClause("name = 'abc")).toThrow("Unterminated string literal in WHERE clause: 'abc");
		expect(() => tokenizeClause('a ! 1')).toThrow(QuerySyntaxError);
	});

	it('should reject integers that lose precision', () =>
	{
		expect(() => tokenizeClause('id = 12345678901234567890')).toThrow('Integer literal out of range: 12345678901234567890');
	});
});

describe('parsePredicate', () =>
{
	it('should parse a single comparison leaf', () =>
	{
		expect(parsePredicate('age > 25')).toEqual({ kind: 'leaf', column: 'age', operator: '>', operand: 25 });
	});

	it('should parse a flat conjunction into a branch', () =>
	{
		expect(parsePredicate("age > 25 AND city = 'NYC'")).toEqual({
			kind: 'branch',
			combinator: 'AND',
			left: { kind: 'leaf', column: 'age', operator: '>', operand: 25 },
			right: { kind: 'leaf', column: 'city', operator: '=', operand: 'NYC' }
		});
	});

	it('should read BETWEEN ... AND ... as one leaf', () =>
	{
		expect(parsePredicate('age BETWEEN 28 AND 32')).toEqual({
			kind: 'leaf', column: 'age', operator: 'BETWEEN', operand: { min: 28, max: 32 }
		});
	});

	it('should keep a range leaf as the left child of a following AND', () =>
	{
		const tree = parsePredicate("age BETWEEN 28 AND 32 AND city='NYC'");

		expect(tree).toEqual({
			kind: 'branch',
			combinator: 'AND',
			left: { kind: 'leaf', column: 'age', operator: 'BETWEEN', operand: { min: 28, max: 32 } },
			right: { kind: 'leaf', column: 'city', operator: '=', operand: 'NYC' }
		});
	});

	it('should handle BETWEEN followed by OR', () =>
	{
		expect(describePredicate(parsePredicate('a BETWEEN 1 AND 5 OR b = 2'))).toBe('(a BETWEEN 1 AND 5 OR b = 2)');
	});

	it('should bind AND tighter than OR', () =>
	{
		expect(describePredicate(parsePredicate('a = 1 OR b = 2 AND c = 3'))).toBe('(a = 1 OR (b = 2 AND c = 3))');
		expect(describePredicate(parsePredicate('a = 1 AND b = 2 OR c = 3'))).toBe('((a = 1 AND b = 2) OR c = 3)');
	});

	it('should associate combinators to the right', () =>
	{
		expect(describePredicate(parsePredicate('a = 1 AND b = 2 AND c = 3'))).toBe('(a = 1 AND (b = 2 AND c = 3))');
	});

	it('should honour parentheses', () =>
	{
		expect(describePredicate(parsePredicate('(a = 1 OR b = 2) AND c = 3'))).toBe('((a = 1 OR b = 2) AND c = 3)');
	});

	it('should parse IN, LIKE and null tests', () =>
	{
		expect(parsePredicate("city IN ('NYC', 'LA', NULL)")).toEqual({
			kind: 'leaf', column: 'city', operator: 'IN', operand: ['NYC', 'LA', null]
		});
		expect(parsePredicate("name like 'A%'")).toEqual({ kind: 'leaf', column: 'name', operator: 'LIKE', operand: 'A%' });
		expect(parsePredicate('email IS NULL')).toEqual({ kind: 'leaf', column: 'email', operator: 'IS NULL' });
		expect(parsePredicate('email is not null')).toEqual({ kind: 'leaf', column: 'email', operator: 'IS NOT NULL' });
	});

	it('should treat bare words as string operands', () =>
	{
		expect(parsePredicate('status = active')).toEqual({ kind: 'leaf', column: 'status', operator: '=', operand: 'active' });
	});

	it('should list referenced columns once each', () =>
	{
		expect(predicateColumns(parsePredicate('a = 1 OR (b > 2 AND a < 9)'))).toEqual(['a', 'b']);
	});

	describe('errors', () =>
	{
		it('should reject an empty clause', () =>
		{
			expect(() => parsePredicate('  ')).toThrow('Empty WHERE clause');
		});

		it('should reject a BETWEEN without its AND', () =>
		{
			expect(() => parsePredicate('age BETWEEN 1 OR 2')).toThrow('Invalid WHERE condition: age BETWEEN 1 OR');
		});

		it('should reject a dangling combinator', () =>
		{
			expect(() => parsePredicate('a = 1 AND')).toThrow('Incomplete WHERE clause: a = 1 AND');
		});

		it('should reject a missing operator', () =>
		{
			expect(() => parsePredicate('a 1')).toThrow('Invalid WHERE condition: a 1');
		});

		it('should reject unbalanced parentheses', () =>
		{
			expect(() => parsePredicate('(a = 1')).toThrow("Missing ')' in WHERE clause: (a = 1");
			expect(() => parsePredicate('a = 1)')).toThrow("Unexpected ')' in WHERE clause: )");
		});

		it('should raise syntax errors only', () =>
		{
			expect(() => parsePredicate('a IN 1')).toThrow(QuerySyntaxError);
		});
	});
});
