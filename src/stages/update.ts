import { QuerySyntaxError, SemanticError } from '../errors';
import { getLogger } from '../logger';
import { evaluatePredicate } from '../predicate/evaluator';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { findOutsideQuotes, splitTopLevel } from '../statements/textScanner';
import { RowStore } from '../storage/rowStore';
import { Row, SqlValue, parseLiteral } from '../values';
import { Payload, PayloadOf, success } from '../workUnit';
import {
	StatementParseStage, assertColumnsExist, assertPredicateColumns, parseWhere, requireCollection, rowCount
} from './common';
import { checkConstraints } from './insert';

const UPDATE_GRAMMAR = 'UPDATE name SET column = value [, column = value ...] [WHERE condition]';

/**
 * Parses `UPDATE name SET assignments [WHERE condition]`.
 */
export class UpdateParseStage extends StatementParseStage
{
	readonly id = 'update-parse';
	protected readonly keyword = /^UPDATE\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^UPDATE\s+(\w+)\s+SET\s+([\s\S]+)$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid UPDATE syntax: ${statement}`, UPDATE_GRAMMAR);
		}

		const body = match[2];
		const where = findOutsideQuotes(body, /\sWHERE(\s|$)/i);
		const setClause = where ? body.slice(0, where.index) : body;
		const assignments = new Map<string, SqlValue>();

		for (const assignment of splitTopLevel(setClause, ','))
		{
			const parts = /^(\w+)\s*=\s*([\s\S]+)$/.exec(assignment);
			if (!parts)
			{
				throw new QuerySyntaxError(`Invalid SET clause: ${assignment}`, UPDATE_GRAMMAR);
			}
			const column = SqlValidator.validateIdentifier(parts[1]);
			if (assignments.has(column))
			{
				throw new SemanticError(`Column '${column}' assigned more than once`);
			}
			assignments.set(column, parseLiteral(parts[2]));
		}

		return {
			kind: 'update',
			spec: {
				statement,
				table: SqlValidator.validateIdentifier(match[1], 'table'),
				assignments: Object.fromEntries(assignments),
				where: parseWhere(where ? body.slice(where.index + where.length) : undefined)
			}
		};
	}
}

/**
 * Applies a parsed UPDATE once every column exists and the changed rows
 * still satisfy NOT NULL and PRIMARY KEY constraints.
 */
export class UpdateExecuteStage extends Stage<'update'>
{
	readonly id = 'update-execute';
	protected readonly accepts = 'update' as const;
	private readonly logger = getLogger('UpdateExecuteStage');

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'update'>, context: StageContext): void
	{
		const { schema, rows } = requireCollection(this.store, spec.table);
		assertColumnsExist(schema, Object.keys(spec.assignments));
		assertPredicateColumns(schema, spec.where);

		const where = spec.where;
		const predicate = where ? (row: Row) => evaluatePredicate(where, row) : undefined;

		const untouched = predicate ? rows.filter(row => !predicate(row)) : [];
		const changed = (predicate ? rows.filter(predicate) : rows).map(row => ({ ...row, ...spec.assignments }));
		checkConstraints(schema, untouched, changed);

		const count = this.store.updateRows(spec.table, spec.assignments, predicate);
		this.logger.info('Rows updated', { table: spec.table, count });
		context.emit(success(`${rowCount(count)} updated`));
	}
}
