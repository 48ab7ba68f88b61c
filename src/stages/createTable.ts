import { QuerySyntaxError, SemanticError } from '../errors';
import { getLogger } from '../logger';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { splitTopLevel, splitWords } from '../statements/textScanner';
import { RowStore } from '../storage/rowStore';
import { ColumnDefinition, ColumnType, TableSchema, defineColumn } from '../storage/schema';
import { SqlValue, parseLiteral } from '../values';
import { Payload, PayloadOf, success } from '../workUnit';
import { StatementParseStage } from './common';

const CREATE_GRAMMAR = 'CREATE TABLE [IF NOT EXISTS] name (column [TYPE] [PRIMARY KEY] [NOT NULL] [DEFAULT value], ...)';

/**
 * Parses `CREATE TABLE [IF NOT EXISTS] name (column definitions)`.
 *
 * Each definition is a column name followed, in any order, by at most one
 * type keyword, `PRIMARY KEY`, `NOT NULL` and `DEFAULT literal`.
 * An omitted type means TEXT.
 */
export class CreateTableParseStage extends StatementParseStage
{
	readonly id = 'create-table-parse';
	protected readonly keyword = /^CREATE\s+TABLE\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^CREATE\s+TABLE\s+(IF\s+NOT\s+EXISTS\s+)?(\w+)\s*\(([\s\S]*)\)$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid CREATE TABLE syntax: ${statement}`, CREATE_GRAMMAR);
		}

		const table = SqlValidator.validateIdentifier(match[2], 'table');
		const columns: ColumnDefinition[] = [];

		for (const definition of splitTopLevel(match[3], ','))
		{
			if (definition === '') continue;

			const column = parseColumnDefinition(definition);
			if (columns.some(c => c.name === column.name))
			{
				throw new SemanticError(`Duplicate column name '${column.name}'`);
			}
			if (column.primaryKey && columns.some(c => c.primaryKey))
			{
				throw new SemanticError('Table can have only one PRIMARY KEY');
			}
			columns.push(column);
		}

		if (columns.length === 0)
		{
			throw new QuerySyntaxError('Table must have at least one column', CREATE_GRAMMAR);
		}

		return {
			kind: 'createTable',
			spec: { statement, schema: new TableSchema(table, columns), ifNotExists: match[1] !== undefined }
		};
	}
}

function parseColumnDefinition(definition: string): ColumnDefinition
{
	const [rawName, ...words] = splitWords(definition);
	const name = SqlValidator.validateIdentifier(rawName);

	let type: ColumnType | undefined;
	let primaryKey = false;
	let notNull = false;
	let defaultValue: SqlValue = null;

	for (let i = 0; i < words.length; i++)
	{
		const word = words[i].toUpperCase();
		const next = words[i + 1];

		switch (word)
		{
			case 'PRIMARY':
				if (next?.toUpperCase() !== 'KEY')
				{
					throw new QuerySyntaxError(`Expected KEY after PRIMARY in column '${name}'`);
				}
				primaryKey = true;
				i++;
				break;

			case 'NOT':
				if (next?.toUpperCase() !== 'NULL')
				{
					throw new QuerySyntaxError(`Expected NULL after NOT in column '${name}'`);
				}
				notNull = true;
				i++;
				break;

			case 'DEFAULT':
				if (next === undefined)
				{
					throw new QuerySyntaxError(`Expected value after DEFAULT in column '${name}'`);
				}
				defaultValue = parseLiteral(next);
				i++;
				break;

			default:
			{
				const columnType = columnTypeOf(word);
				if (!columnType)
				{
					throw new QuerySyntaxError(`Unknown keyword '${words[i]}' in column '${name}'`, CREATE_GRAMMAR);
				}
				if (type)
				{
					throw new QuerySyntaxError(`Multiple types specified for column '${name}'`);
				}
				type = columnType;
			}
		}
	}

	return defineColumn(name, { type, primaryKey, notNull, defaultValue });
}

function columnTypeOf(word: string): ColumnType | undefined
{
	try
	{
		return SqlValidator.validateColumnType(word);
	}
	catch (error)
	{
		if (error instanceof QuerySyntaxError) return undefined;
		throw error;
	}
}

/**
 * Creates the table described by a parsed CREATE TABLE.
 */
export class CreateTableExecuteStage extends Stage<'createTable'>
{
	readonly id = 'create-table-execute';
	protected readonly accepts = 'createTable' as const;
	private readonly logger = getLogger('CreateTableExecuteStage');

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'createTable'>, context: StageContext): void
	{
		const name = spec.schema.name;

		if (this.store.hasCollection(name))
		{
			if (!spec.ifNotExists)
			{
				throw new SemanticError(`Table '${name}' already exists`);
			}
			context.emit(success(`Table '${name}' already exists (skipped)`));
			return;
		}

		this.store.createCollection(spec.schema);
		this.logger.info('Table created', { schema: spec.schema.toString() });
		context.emit(success(`Table '${name}' created`));
	}
}
