import { SqlValue, toLiteral } from '../values';

/** Column types accepted by CREATE TABLE. Values are not coerced to them. */
export const COLUMN_TYPES = ['INTEGER', 'TEXT', 'REAL', 'BLOB'] as const;

export type ColumnType = typeof COLUMN_TYPES[number];

/**
 * One column of a table schema.
 */
export interface ColumnDefinition
{
	name: string;
	type: ColumnType;
	/** Implies notNull */
	primaryKey: boolean;
	notNull: boolean;
	/** Value used when an INSERT omits the column; null means no default */
	defaultValue: SqlValue;
}

/**
 * Builds a column definition, applying PRIMARY KEY => NOT NULL.
 */
export function defineColumn(
	name: string,
	options: Partial<Omit<ColumnDefinition, 'name'>> = {}
): ColumnDefinition
{
	const primaryKey = options.primaryKey ?? false;
	return {
		name,
		type: options.type ?? 'TEXT',
		primaryKey,
		notNull: primaryKey || (options.notNull ?? false),
		defaultValue: options.defaultValue ?? null
	};
}

/**
 * Ordered, immutable set of column definitions for one table.
 */
export class TableSchema
{
	private readonly columnsByName: ReadonlyMap<string, ColumnDefinition>;

	constructor(
		readonly name: string,
		readonly columns: readonly ColumnDefinition[]
	)
	{
		this.columnsByName = new Map(columns.map(c => [c.name, c]));
	}

	hasColumn(name: string): boolean
	{
		return this.columnsByName.has(name);
	}

	getColumn(name: string): ColumnDefinition | undefined
	{
		return this.columnsByName.get(name);
	}

	getColumnNames(): string[]
	{
		return this.columns.map(c => c.name);
	}

	getColumnCount(): number
	{
		return this.columns.length;
	}

	getPrimaryKey(): string | undefined
	{
		return this.columns.find(c => c.primaryKey)?.name;
	}

	/**
	 * Renders the schema as column definition text, e.g.
	 * `users (id INTEGER PRIMARY KEY, name TEXT NOT NULL)`.
	 */
	toString(): string
	{
		const defs = this.columns.map(c =>
		{
			let def = `${c.name} ${c.type}`;
			if (c.primaryKey) def += ' PRIMARY KEY';
			else if (c.notNull) def += ' NOT NULL';
			if (c.defaultValue !== null) def += ` DEFAULT ${toLiteral(c.defaultValue)}`;
			return def;
		});
		return `${this.name} (${defs.join(', ')})`;
	}
}
