import { SqlValue, toLiteral } from '../values';

/**
 * Binary comparison operators, longest spellings first so a scanner can
 * match `<=` before `<`.
 */
export const COMPARISON_OPERATORS = ['!=', '<=', '>=', '<>', '=', '<', '>'] as const;

export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];

export type Combinator = 'AND' | 'OR';

/**
 * Single condition on one column. The operand's shape is fixed by the operator:
 * a value list for IN, a {min, max} pair for BETWEEN, nothing for the null tests.
 * Examples:
 * { kind: 'leaf', column: 'age', operator: '>', operand: 25 }
 * { kind: 'leaf', column: 'city', operator: 'IN', operand: ['NYC', 'LA'] }
 * { kind: 'leaf', column: 'email', operator: 'IS NULL' }
 */
export type PredicateLeaf =
	| { kind: 'leaf'; column: string; operator: ComparisonOperator; operand: SqlValue }
	| { kind: 'leaf'; column: string; operator: 'IN'; operand: readonly SqlValue[] }
	| { kind: 'leaf'; column: string; operator: 'LIKE'; operand: SqlValue }
	| { kind: 'leaf'; column: string; operator: 'BETWEEN'; operand: { readonly min: SqlValue; readonly max: SqlValue } }
	| { kind: 'leaf'; column: string; operator: 'IS NULL' | 'IS NOT NULL' };

/**
 * Logical combination of two sub-trees.
 */
export interface PredicateBranch
{
	kind: 'branch';
	left: PredicateTree;
	combinator: Combinator;
	right: PredicateTree;
}

/**
 * Parsed WHERE clause. Immutable once built.
 */
export type PredicateTree = PredicateLeaf | PredicateBranch;

/**
 * Columns referenced anywhere in the tree, in first-seen order, without duplicates.
 */
export function predicateColumns(tree: PredicateTree): string[]
{
	const columns: string[] = [];
	const visit = (node: PredicateTree): void =>
	{
		if (node.kind === 'branch')
		{
			visit(node.left);
			visit(node.right);
			return;
		}
		if (!columns.includes(node.column)) columns.push(node.column);
	};
	visit(tree);
	return columns;
}

/**
 * Renders a tree back to clause text, parenthesising every branch.
 */
export function describePredicate(tree: PredicateTree): string
{
	if (tree.kind === 'branch')
	{
		return `(${describePredicate(tree.left)} ${tree.combinator} ${describePredicate(tree.right)})`;
	}

	switch (tree.operator)
	{
		case 'IS NULL':
		case 'IS NOT NULL':
			return `${tree.column} ${tree.operator}`;
		case 'IN':
			return `${tree.column} IN (${tree.operand.map(toLiteral).join(', ')})`;
		case 'BETWEEN':
			return `${tree.column} BETWEEN ${toLiteral(tree.operand.min)} AND ${toLiteral(tree.operand.max)}`;
		default:
			return `${tree.column} ${tree.operator} ${toLiteral(tree.operand)}`;
	}
}
