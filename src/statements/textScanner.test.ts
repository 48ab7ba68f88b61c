import { describe, it, expect } from 'vitest';
import { QuerySyntaxError } from '../errors';
import { findOutsideQuotes, maskQuoted, quotesBalanced, splitTopLevel, splitTuples, splitWords } from './textScanner';

describe('textScanner', () =>
{
	it('should mask quoted content but keep length and quotes', () =>
	{
		const text = "name = 'a WHERE b'";
		const masked = maskQuoted(text);

		expect(masked).toBe("name = '_________'");
		expect(masked.length).toBe(text.length);
	});

	it('should find keywords outside quotes only', () =>
	{
		const text = "SET note = 'see WHERE' WHERE id = 1";

		expect(findOutsideQuotes(text, /\sWHERE\s/i)).toEqual({ index: 22, length: 7 });
		expect(findOutsideQuotes("x = 'LIMIT 1'", /LIMIT/)).toBeUndefined();
	});

	it('should detect unterminated literals', () =>
	{
		expect(quotesBalanced("a = 'it''s'")).toBe(true);
		expect(quotesBalanced("a = 'open")).toBe(false);
		expect(quotesBalanced('a = "x\' y"')).toBe(true);
	});

	it('should split on separators outside quotes and parentheses', () =>
	{
		expect(splitTopLevel("1, 'a,b', (2, 3), NULL", ',')).toEqual(['1', "'a,b'", '(2, 3)', 'NULL']);
		expect(splitTopLevel("SELECT 1; SELECT ';'", ';')).toEqual(['SELECT 1', "SELECT ';'"]);
	});

	describe('splitTuples', () =>
	{
		it('should split a batch VALUES section', () =>
		{
			expect(splitTuples("(1, 'a'), (2, 'b'),(3,'c')")).toEqual(["1, 'a'", "2, 'b'", "3,'c'"]);
		});

		it('should leave tuple boundaries inside literals alone', () =>
		{
			expect(splitTuples("(1, 'x), (y')")).toEqual(["1, 'x), (y'"]);
		});

		it('should reject a section that is not a tuple list', () =>
		{
			expect(() => splitTuples('1, 2')).toThrow(QuerySyntaxError);
			expect(() => splitTuples('1, 2')).toThrow('Invalid VALUES syntax: 1, 2');
		});
	});

	it('should split words keeping quoted literals whole', () =>
	{
		expect(splitWords("name TEXT DEFAULT 'John Doe'  NOT NULL")).toEqual(['name', 'TEXT', 'DEFAULT', "'John Doe'", 'NOT', 'NULL']);
	});
});
