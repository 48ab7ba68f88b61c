import { QuerySyntaxError } from '../errors';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { OrderSpec } from '../statements/statementSpec';
import { findOutsideQuotes, splitTopLevel } from '../statements/textScanner';
import { RowStore } from '../storage/rowStore';
import { Payload, PayloadOf, RowSetPhase } from '../workUnit';
import {
	StatementParseStage, assertColumnsExist, assertPredicateColumns, parseWhere, requireCollection
} from './common';

const SELECT_GRAMMAR =
	'SELECT [DISTINCT] * | column, ... FROM name [WHERE condition] [ORDER BY column [ASC|DESC]] [LIMIT n [OFFSET m]]';

/**
 * Parses SELECT. Clauses must appear in the order WHERE, ORDER BY, LIMIT;
 * anything left over is a syntax error.
 */
export class SelectParseStage extends StatementParseStage
{
	readonly id = 'select-parse';
	protected readonly keyword = /^SELECT\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^SELECT\s+(DISTINCT\s+)?([\s\S]+?)\s+FROM\s+(\w+)([\s\S]*)$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid SELECT syntax: ${statement}`, SELECT_GRAMMAR);
		}

		const projection = match[2].trim();
		const columns = projection === '*'
			? []
			: splitTopLevel(projection, ',').map(c => SqlValidator.validateIdentifier(c));

		let rest = match[4].trim();
		let whereClause: string | undefined;
		let orderBy: OrderSpec | undefined;
		let limit: number | undefined;
		let offset: number | undefined;

		if (/^WHERE\b/i.test(rest))
		{
			const next = findOutsideQuotes(rest, /\s(ORDER\s+BY|LIMIT)\s/i);
			const end = next ? next.index : rest.length;
			whereClause = rest.slice('WHERE'.length, end);
			rest = rest.slice(end).trim();
		}

		const order = /^ORDER\s+BY\s+(\w+)(?:\s+(ASC|DESC))?(?=\s|$)/i.exec(rest);
		if (order)
		{
			orderBy = {
				column: SqlValidator.validateIdentifier(order[1]),
				direction: SqlValidator.validateDirection(order[2])
			};
			rest = rest.slice(order[0].length).trim();
		}

		const limits = /^LIMIT\s+(\S+)(?:\s+OFFSET\s+(\S+))?$/i.exec(rest);
		if (limits)
		{
			limit = SqlValidator.validateCount(limits[1], 'LIMIT');
			offset = limits[2] === undefined ? undefined : SqlValidator.validateCount(limits[2], 'OFFSET');
			rest = '';
		}

		if (rest !== '')
		{
			throw new QuerySyntaxError(`Unexpected text in SELECT: ${rest}`, SELECT_GRAMMAR);
		}

		return {
			kind: 'select',
			spec: {
				statement,
				table: SqlValidator.validateIdentifier(match[3], 'table'),
				columns,
				distinct: match[1] !== undefined,
				where: parseWhere(whereClause),
				orderBy,
				limit,
				offset
			}
		};
	}
}

/**
 * Resolves a parsed SELECT against the store: checks every referenced
 * column, then emits the table's rows as the first row-set.
 */
export class TableScanStage extends Stage<'select'>
{
	readonly id = 'table-scan';
	protected readonly accepts = 'select' as const;

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'select'>, context: StageContext): void
	{
		const { schema, rows } = requireCollection(this.store, spec.table);

		assertColumnsExist(schema, spec.columns);
		assertPredicateColumns(schema, spec.where);
		if (spec.orderBy)
		{
			assertColumnsExist(schema, [spec.orderBy.column]);
		}

		context.emit({
			kind: 'rowSet',
			rowSet: {
				rows,
				columns: spec.columns.length > 0 ? spec.columns : schema.getColumnNames(),
				select: spec,
				phase: RowSetPhase.Scanned
			}
		});
	}
}
