import { QuerySyntaxError, SemanticError } from '../errors';
import { parsePredicate } from '../predicate/parser';
import { PredicateTree, predicateColumns } from '../predicate/types';
import { Stage, StageContext } from '../stage';
import { quotesBalanced } from '../statements/textScanner';
import { Collection, RowStore } from '../storage/rowStore';
import { TableSchema } from '../storage/schema';
import { Payload, PayloadOf } from '../workUnit';

/**
 * Trims a statement and drops trailing semicolons.
 */
export function normalizeStatement(text: string): string
{
	return text.trim().replace(/;+\s*$/, '').trim();
}

/**
 * `1 row` / `3 rows`
 */
export function rowCount(count: number): string
{
	return `${count} row${count === 1 ? '' : 's'}`;
}

/**
 * Parses the text after WHERE, if any.
 */
export function parseWhere(clause: string | undefined): PredicateTree | undefined
{
	return clause === undefined ? undefined : parsePredicate(clause.trim());
}

/**
 * Base for the statement parsers. Applies only to raw statement text
 * starting with `keyword`, so a parser never sees its own typed output.
 */
export abstract class StatementParseStage extends Stage<'statement'>
{
	protected readonly accepts = 'statement' as const;

	/** Anchored, case-insensitive keyword prefix */
	protected abstract readonly keyword: RegExp;

	protected override applies(payload: PayloadOf<'statement'>): boolean
	{
		return this.keyword.test(payload.text.trimStart());
	}

	protected process(payload: PayloadOf<'statement'>, context: StageContext): void
	{
		const statement = normalizeStatement(payload.text);
		if (!quotesBalanced(statement))
		{
			throw new QuerySyntaxError(`Unterminated string literal: ${statement}`);
		}
		context.emit(this.parse(statement));
	}

	/**
	 * Turns the normalized statement into its typed payload.
	 * @throws QuerySyntaxError or SemanticError
	 */
	protected abstract parse(statement: string): Payload;
}

/**
 * @throws SemanticError when the table does not exist
 */
export function requireCollection(store: RowStore, table: string): Collection
{
	const collection = store.getCollection(table);
	if (!collection)
	{
		throw new SemanticError(`Table '${table}' does not exist`);
	}
	return collection;
}

/**
 * @throws SemanticError naming the first column missing from the schema
 */
export function assertColumnsExist(schema: TableSchema, columns: Iterable<string>): void
{
	for (const column of columns)
	{
		if (!schema.hasColumn(column))
		{
			throw new SemanticError(`Column '${column}' does not exist in table '${schema.name}'`);
		}
	}
}

/**
 * Checks every column a WHERE clause references against the schema.
 */
export function assertPredicateColumns(schema: TableSchema, where: PredicateTree | undefined): void
{
	if (where)
	{
		assertColumnsExist(schema, predicateColumns(where));
	}
}
