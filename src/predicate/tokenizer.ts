import { QuerySyntaxError } from '../errors';
import { parseNumber } from '../values';
import { COMPARISON_OPERATORS, ComparisonOperator } from './types';

export type ClauseToken =
	| { kind: 'word'; text: string; start: number; end: number }
	| { kind: 'number'; text: string; value: number; start: number; end: number }
	| { kind: 'string'; text: string; value: string; start: number; end: number }
	| { kind: 'operator'; text: ComparisonOperator; start: number; end: number }
	| { kind: 'comma' | 'lparen' | 'rparen'; text: string; start: number; end: number };

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;
const BARE_CHAR = /[^\s,()'"=<>!]/;

function isOperator(text: string): text is ComparisonOperator
{
	return COMPARISON_OPERATORS.some(op => op === text);
}

/**
 * Splits a conditional clause into tokens, keeping source offsets for
 * error reporting. Bare runs that read as integers or decimals become
 * number tokens; every other bare run is a word (identifier, keyword or
 * unquoted string operand).
 */
export function tokenizeClause(clause: string): ClauseToken[]
{
	const tokens: ClauseToken[] = [];
	let i = 0;

	while (i < clause.length)
	{
		const char = clause[i];

		if (/\s/.test(char))
		{
			i++;
			continue;
		}

		if (char === '\'' || char === '"')
		{
			const start = i;
			let value = '';
			i++;
			for (;;)
			{
				if (i >= clause.length)
				{
					throw new QuerySyntaxError(`Unterminated string literal in WHERE clause: ${clause.slice(start)}`);
				}
				if (clause[i] === char)
				{
					if (clause[i + 1] === char)
					{
						value += char;
						i += 2;
						continue;
					}
					i++;
					break;
				}
				value += clause[i];
				i++;
			}
			tokens.push({ kind: 'string', text: clause.slice(start, i), value, start, end: i });
			continue;
		}

		if (char === ',' || char === '(' || char === ')')
		{
			const kind = char === ',' ? 'comma' : char === '(' ? 'lparen' : 'rparen';
			tokens.push({ kind, text: char, start: i, end: i + 1 });
			i++;
			continue;
		}

		const pair = clause.slice(i, i + 2);
		if (isOperator(pair))
		{
			tokens.push({ kind: 'operator', text: pair, start: i, end: i + 2 });
			i += 2;
			continue;
		}
		if (isOperator(char))
		{
			tokens.push({ kind: 'operator', text: char, start: i, end: i + 1 });
			i++;
			continue;
		}
		if (char === '!')
		{
			throw new QuerySyntaxError(`Unexpected character '!' in WHERE clause: ${clause.slice(i)}`);
		}

		const start = i;
		while (i < clause.length && BARE_CHAR.test(clause[i])) i++;
		const text = clause.slice(start, i);

		if (NUMBER_PATTERN.test(text))
		{
			tokens.push({ kind: 'number', text, value: parseNumber(text), start, end: i });
		}
		else
		{
			tokens.push({ kind: 'word', text, start, end: i });
		}
	}

	return tokens;
}
