import { Row, SqlValue } from '../values';
import { TableSchema } from './schema';

/**
 * Row filter passed to update/delete. Absent means "every row".
 */
export type RowPredicate = (row: Row) => boolean;

/**
 * Schema plus a snapshot of the rows of one table.
 */
export interface Collection
{
	schema: TableSchema;
	rows: readonly Row[];
}

/**
 * Table storage consumed by the execution stages. The engine only calls
 * these methods; validation happens before any of the mutating ones.
 */
export interface RowStore
{
	hasCollection(name: string): boolean;

	/**
	 * @returns undefined when no such table exists
	 */
	getCollection(name: string): Collection | undefined;

	/**
	 * @throws Error if a table with the schema's name already exists
	 */
	createCollection(schema: TableSchema): void;

	/**
	 * @throws Error if the table does not exist
	 */
	dropCollection(name: string): void;

	insertRow(collection: string, row: Row): void;

	/**
	 * Replaces every matching row with a copy carrying `changes`.
	 * @returns Number of rows updated
	 */
	updateRows(collection: string, changes: Readonly<Record<string, SqlValue>>, predicate?: RowPredicate): number;

	/**
	 * @returns Number of rows deleted
	 */
	deleteRows(collection: string, predicate?: RowPredicate): number;

	/** Table names in creation order */
	collectionNames(): string[];

	/** Removes every table */
	clear(): void;
}

interface StoredTable
{
	schema: TableSchema;
	rows: Row[];
}

/**
 * Map-backed RowStore. Rows are frozen on the way in and replaced on update.
 */
export class MemoryRowStore implements RowStore
{
	private readonly tables = new Map<string, StoredTable>();

	hasCollection(name: string): boolean
	{
		return this.tables.has(name);
	}

	getCollection(name: string): Collection | undefined
	{
		const table = this.tables.get(name);
		return table ? { schema: table.schema, rows: [...table.rows] } : undefined;
	}

	createCollection(schema: TableSchema): void
	{
		if (this.tables.has(schema.name))
		{
			throw new Error(`Table '${schema.name}' already exists`);
		}
		this.tables.set(schema.name, { schema, rows: [] });
	}

	dropCollection(name: string): void
	{
		if (!this.tables.delete(name))
		{
			throw new Error(`Table '${name}' does not exist`);
		}
	}

	insertRow(collection: string, row: Row): void
	{
		this.require(collection).rows.push(Object.freeze({ ...row }));
	}

	updateRows(collection: string, changes: Readonly<Record<string, SqlValue>>, predicate?: RowPredicate): number
	{
		const table = this.require(collection);
		let count = 0;

		table.rows = table.rows.map(row =>
		{
			if (predicate && !predicate(row)) return row;
			count++;
			return Object.freeze({ ...row, ...changes });
		});

		return count;
	}

	deleteRows(collection: string, predicate?: RowPredicate): number
	{
		const table = this.require(collection);
		const before = table.rows.length;

		table.rows = predicate ? table.rows.filter(row => !predicate(row)) : [];

		return before - table.rows.length;
	}

	collectionNames(): string[]
	{
		return [...this.tables.keys()];
	}

	clear(): void
	{
		this.tables.clear();
	}

	private require(name: string): StoredTable
	{
		const table = this.tables.get(name);
		if (!table)
		{
			throw new Error(`Table '${name}' does not exist`);
		}
		return table;
	}
}
