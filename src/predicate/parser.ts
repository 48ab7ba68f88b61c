/**
 * Recursive-descent parser for WHERE clauses.
 *
 * Grammar, lowest precedence first:
 *
 *   or      := and ( OR or )?
 *   and     := primary ( AND and )?
 *   primary := '(' or ')' | leaf
 *   leaf    := col IS NOT NULL | col IS NULL
 *            | col BETWEEN operand AND operand
 *            | col IN '(' operand ( ',' operand )* ')'
 *            | col LIKE operand
 *            | col ( != | <= | >= | <> | = | < | > ) operand
 *
 * The AND of a BETWEEN is consumed inside the leaf production, so it is never
 * seen by the `and` rule. Combinators associate to the right.
 *
 * @module predicate/parser
 */

import { QuerySyntaxError } from '../errors';
import { getLogger } from '../logger';
import { SqlValue } from '../values';
import { ClauseToken, tokenizeClause } from './tokenizer';
import { Combinator, PredicateLeaf, PredicateTree } from './types';

const RESERVED = new Set(['AND', 'OR', 'IS', 'NOT', 'NULL', 'BETWEEN', 'IN', 'LIKE']);
const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const logger = getLogger('PredicateParser');

class ClauseParser
{
	private position = 0;

	constructor(
		private readonly source: string,
		private readonly tokens: readonly ClauseToken[]
	)
	{
	}

	parse(): PredicateTree
	{
		if (this.tokens.length === 0)
		{
			throw new QuerySyntaxError('Empty WHERE clause');
		}

		const tree = this.parseOr();

		const leftover = this.peek();
		if (leftover)
		{
			throw new QuerySyntaxError(`Unexpected '${leftover.text}' in WHERE clause: ${this.source.slice(leftover.start)}`);
		}

		return tree;
	}

	private parseOr(): PredicateTree
	{
		return this.parseCombination('OR', () => this.parseAnd());
	}

	private parseAnd(): PredicateTree
	{
		return this.parseCombination('AND', () => this.parsePrimary());
	}

	private parseCombination(combinator: Combinator, operand: () => PredicateTree): PredicateTree
	{
		const left = operand();
		if (!this.peekKeyword(combinator))
		{
			return left;
		}

		this.position++;
		const right = this.parseCombination(combinator, operand);
		return { kind: 'branch', left, combinator, right };
	}

	private parsePrimary(): PredicateTree
	{
		const token = this.peek();
		if (token?.kind !== 'lparen')
		{
			return this.parseLeaf();
		}

		this.position++;
		const inner = this.parseOr();
		const closing = this.peek();
		if (closing?.kind !== 'rparen')
		{
			throw new QuerySyntaxError(`Missing ')' in WHERE clause: ${this.source.slice(token.start)}`);
		}
		this.position++;
		return inner;
	}

	private parseLeaf(): PredicateLeaf
	{
		const first = this.peek();
		if (!first)
		{
			throw new QuerySyntaxError(`Incomplete WHERE clause: ${this.source}`);
		}

		const startOffset = first.start;
		if (first.kind !== 'word' || RESERVED.has(first.text.toUpperCase()) || !IDENTIFIER.test(first.text))
		{
			throw this.invalidCondition(startOffset);
		}
		const column = first.text;
		this.position++;

		const next = this.peek();
		if (!next)
		{
			throw this.invalidCondition(startOffset);
		}

		if (next.kind === 'operator')
		{
			this.position++;
			return { kind: 'leaf', column, operator: next.text, operand: this.parseOperand(startOffset) };
		}

		switch (next.kind === 'word' ? next.text.toUpperCase() : '')
		{
			case 'IS':
			{
				this.position++;
				const negated = this.peekKeyword('NOT');
				if (negated) this.position++;
				this.expectKeyword('NULL', startOffset);
				return { kind: 'leaf', column, operator: negated ? 'IS NOT NULL' : 'IS NULL' };
			}

			case 'BETWEEN':
			{
				this.position++;
				const min = this.parseOperand(startOffset);
				this.expectKeyword('AND', startOffset);
				const max = this.parseOperand(startOffset);
				return { kind: 'leaf', column, operator: 'BETWEEN', operand: { min, max } };
			}

			case 'IN':
			{
				this.position++;
				if (this.peek()?.kind !== 'lparen')
				{
					throw this.invalidCondition(startOffset);
				}
				this.position++;
				const values: SqlValue[] = [this.parseOperand(startOffset)];
				while (this.peek()?.kind === 'comma')
				{
					this.position++;
					values.push(this.parseOperand(startOffset));
				}
				if (this.peek()?.kind !== 'rparen')
				{
					throw this.invalidCondition(startOffset);
				}
				this.position++;
				return { kind: 'leaf', column, operator: 'IN', operand: values };
			}

			case 'LIKE':
				this.position++;
				return { kind: 'leaf', column, operator: 'LIKE', operand: this.parseOperand(startOffset) };

			default:
				throw this.invalidCondition(startOffset);
		}
	}

	private parseOperand(startOffset: number): SqlValue
	{
		const token = this.peek();
		if (!token)
		{
			throw this.invalidCondition(startOffset);
		}

		switch (token.kind)
		{
			case 'string':
			case 'number':
				this.position++;
				return token.value;
			case 'word':
			{
				const upper = token.text.toUpperCase();
				if (upper === 'NULL')
				{
					this.position++;
					return null;
				}
				if (RESERVED.has(upper))
				{
					throw this.invalidCondition(startOffset);
				}
				this.position++;
				return token.text;
			}
			default:
				throw this.invalidCondition(startOffset);
		}
	}

	private peek(): ClauseToken | undefined
	{
		return this.tokens[this.position];
	}

	private peekKeyword(keyword: string): boolean
	{
		const token = this.peek();
		return token?.kind === 'word' && token.text.toUpperCase() === keyword;
	}

	private expectKeyword(keyword: string, startOffset: number): void
	{
		if (!this.peekKeyword(keyword))
		{
			throw this.invalidCondition(startOffset);
		}
		this.position++;
	}

	/**
	 * Error quoting the condition from its first token through the token
	 * that could not be consumed (or the end of the clause).
	 */
	private invalidCondition(startOffset: number): QuerySyntaxError
	{
		const failed = this.peek();
		const end = failed ? failed.end : this.source.length;
		return new QuerySyntaxError(
			`Invalid WHERE condition: ${this.source.slice(startOffset, end).trim()}`,
			'column <op> value, column IS [NOT] NULL, column BETWEEN a AND b, column IN (...), column LIKE pattern'
		);
	}
}

/**
 * Parses a conditional clause (the text after WHERE) into a predicate tree.
 * @throws QuerySyntaxError describing the offending fragment; no partial tree is returned
 */
export function parsePredicate(clause: string): PredicateTree
{
	const tree = new ClauseParser(clause, tokenizeClause(clause)).parse();
	logger.debug('Parsed WHERE clause', { clause });
	return tree;
}
