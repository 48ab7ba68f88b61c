import { QuerySyntaxError, SemanticError } from '../errors';
import { getLogger } from '../logger';
import { valuesEqual } from '../predicate/evaluator';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { InsertSpec } from '../statements/statementSpec';
import { splitTopLevel, splitTuples } from '../statements/textScanner';
import { RowStore } from '../storage/rowStore';
import { TableSchema } from '../storage/schema';
import { Row, SqlValue, parseLiteral, toLiteral } from '../values';
import { Payload, PayloadOf, success } from '../workUnit';
import { StatementParseStage, assertColumnsExist, requireCollection, rowCount } from './common';

const INSERT_GRAMMAR = 'INSERT INTO name [(column, ...)] VALUES (value, ...) [, (value, ...)]';

/**
 * Parses `INSERT INTO name [(columns)] VALUES (tuple) [, (tuple) ...]`.
 * With a column list every tuple must match its length; positional tuples
 * are checked against the schema at execution.
 */
export class InsertParseStage extends StatementParseStage
{
	readonly id = 'insert-parse';
	protected readonly keyword = /^INSERT\s+INTO\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^INSERT\s+INTO\s+(\w+)\s*(?:\(([^)]*)\)\s*)?VALUES\s*([\s\S]+)$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid INSERT syntax: ${statement}`, INSERT_GRAMMAR);
		}

		const table = SqlValidator.validateIdentifier(match[1], 'table');
		const columns = match[2] === undefined
			? undefined
			: splitTopLevel(match[2], ',').map(c => SqlValidator.validateIdentifier(c));

		if (columns)
		{
			const duplicate = columns.find((c, i) => columns.indexOf(c) !== i);
			if (duplicate)
			{
				throw new SemanticError(`Column '${duplicate}' specified more than once`);
			}
		}

		const tuples = splitTuples(match[3]).map((tuple, index) =>
		{
			if (tuple.trim() === '')
			{
				throw new QuerySyntaxError(`Empty VALUES tuple in row ${index + 1}`, INSERT_GRAMMAR);
			}
			return splitTopLevel(tuple, ',').map(parseLiteral);
		});

		if (columns)
		{
			tuples.forEach((tuple, index) =>
			{
				if (tuple.length !== columns.length)
				{
					const row = tuples.length > 1 ? ` in row ${index + 1}` : '';
					throw new SemanticError(`Column count (${columns.length}) does not match value count (${tuple.length})${row}`);
				}
			});
		}

		return { kind: 'insert', spec: { statement, table, columns, tuples } };
	}
}

/**
 * Builds every row of the batch, checks NOT NULL and PRIMARY KEY
 * constraints against the table and the batch itself, then inserts.
 * A rejected batch leaves the table untouched.
 */
export class InsertExecuteStage extends Stage<'insert'>
{
	readonly id = 'insert-execute';
	protected readonly accepts = 'insert' as const;
	private readonly logger = getLogger('InsertExecuteStage');

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'insert'>, context: StageContext): void
	{
		const { schema, rows: existing } = requireCollection(this.store, spec.table);
		const rows = buildRows(schema, spec);
		checkConstraints(schema, existing, rows);

		for (const row of rows)
		{
			this.store.insertRow(spec.table, row);
		}

		this.logger.info('Rows inserted', { table: spec.table, count: rows.length });
		context.emit(success(`${rowCount(rows.length)} inserted into '${spec.table}'`));
	}
}

function buildRows(schema: TableSchema, spec: InsertSpec): Row[]
{
	const columns = spec.columns;

	if (!columns)
	{
		return spec.tuples.map(tuple =>
		{
			if (tuple.length !== schema.getColumnCount())
			{
				throw new SemanticError(
					`Column count mismatch. Table '${schema.name}' has ${schema.getColumnCount()} columns, but INSERT provides ${tuple.length} values`
				);
			}
			return Object.fromEntries(schema.columns.map((c, i): [string, SqlValue] => [c.name, tuple[i]]));
		});
	}

	assertColumnsExist(schema, columns);

	return spec.tuples.map(tuple =>
		Object.fromEntries(schema.columns.map((c): [string, SqlValue] =>
		{
			const index = columns.indexOf(c.name);
			return [c.name, index === -1 ? c.defaultValue : tuple[index]];
		}))
	);
}

/**
 * @throws SemanticError on a NULL in a NOT NULL column or a repeated
 * primary key, whether it repeats a stored row or another row of the batch
 */
export function checkConstraints(schema: TableSchema, existing: readonly Row[], rows: readonly Row[]): void
{
	const primaryKey = schema.getPrimaryKey();
	const keys: SqlValue[] = primaryKey ? existing.map(row => row[primaryKey] ?? null) : [];

	for (const row of rows)
	{
		for (const column of schema.columns)
		{
			if (column.notNull && (row[column.name] ?? null) === null)
			{
				throw new SemanticError(`Column '${column.name}' cannot be NULL`);
			}
		}

		if (primaryKey)
		{
			const key = row[primaryKey] ?? null;
			if (keys.some(k => valuesEqual(k, key)))
			{
				throw new SemanticError(`Duplicate value ${toLiteral(key)} for PRIMARY KEY column '${primaryKey}'`);
			}
			keys.push(key);
		}
	}
}
