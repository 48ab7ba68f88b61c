import { Row, SqlValue, compareValues, isNumericValue } from '../values';
import { PredicateLeaf, PredicateTree } from './types';

const likePatterns = new WeakMap<PredicateLeaf, RegExp>();

/**
 * Equality used by =, !=, IN: numeric when both sides are numeric
 * (so '5' equals 5), exact string comparison otherwise. Null equals nothing.
 */
export function valuesEqual(a: SqlValue, b: SqlValue): boolean
{
	if (a === null || b === null) return false;
	if (isNumericValue(a) && isNumericValue(b)) return Number(a) === Number(b);
	return String(a) === String(b);
}

/**
 * Translates a LIKE pattern into an anchored, case-insensitive RegExp:
 * `%` matches any run of characters, `_` exactly one.
 */
export function likeToRegExp(pattern: string): RegExp
{
	let source = '';
	for (const char of pattern)
	{
		if (char === '%') source += '.*';
		else if (char === '_') source += '.';
		else source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
	}
	return new RegExp(`^${source}$`, 'is');
}

function likePattern(leaf: PredicateLeaf, pattern: string): RegExp
{
	let regex = likePatterns.get(leaf);
	if (!regex)
	{
		regex = likeToRegExp(pattern);
		likePatterns.set(leaf, regex);
	}
	return regex;
}

function compareOrdered(value: SqlValue, operand: SqlValue, operator: '<' | '>' | '<=' | '>='): boolean
{
	if (value === null || operand === null) return false;

	const order = compareValues(value, operand);
	if (operator === '<') return order < 0;
	if (operator === '>') return order > 0;
	if (operator === '<=') return order <= 0;
	return order >= 0;
}

function evaluateLeaf(leaf: PredicateLeaf, row: Row): boolean
{
	const value = row[leaf.column] ?? null;

	switch (leaf.operator)
	{
		case 'IS NULL':
			return value === null;
		case 'IS NOT NULL':
			return value !== null;
		case 'IN':
			return leaf.operand.some(candidate => valuesEqual(value, candidate));
		case 'LIKE':
			if (value === null || leaf.operand === null) return false;
			return likePattern(leaf, String(leaf.operand)).test(String(value));
		case 'BETWEEN':
		{
			const { min, max } = leaf.operand;
			if (value === null || min === null || max === null) return false;
			return compareValues(value, min) >= 0 && compareValues(value, max) <= 0;
		}
		case '=':
			return valuesEqual(value, leaf.operand);
		case '!=':
		case '<>':
			return value !== null && leaf.operand !== null && !valuesEqual(value, leaf.operand);
		case '<':
		case '>':
		case '<=':
		case '>=':
			return compareOrdered(value, leaf.operand, leaf.operator);
	}
}

/**
 * Evaluates a predicate tree against one row. Pure; both children of a
 * branch are always evaluated.
 */
export function evaluatePredicate(tree: PredicateTree, row: Row): boolean
{
	if (tree.kind === 'leaf')
	{
		return evaluateLeaf(tree, row);
	}

	const left = evaluatePredicate(tree.left, row);
	const right = evaluatePredicate(tree.right, row);
	return tree.combinator === 'AND' ? left && right : left || right;
}
