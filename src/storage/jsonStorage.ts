/**
 * JSON persistence for the row store.
 *
 * A database file holds every table's schema and rows:
 *
 * ```json
 * {
 *   "version": 1,
 *   "created": "2026-01-01T00:00:00.000Z",
 *   "tables": [
 *     {
 *       "schema": { "name": "users", "columns": [{ "name": "id", "type": "INTEGER", "primaryKey": true, "notNull": true, "default": null }] },
 *       "rows": [{ "id": 1 }]
 *     }
 *   ]
 * }
 * ```
 *
 * @module storage/jsonStorage
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError } from '../errors';
import { getLogger } from '../logger';
import { MemoryRowStore, RowStore } from './rowStore';
import { COLUMN_TYPES, TableSchema, defineColumn } from './schema';
import { SqlValue } from '../values';

export const FORMAT_VERSION = 1;
export const FILE_EXTENSION = '.stagedb';

const SqlValueSchema = z.union([z.string(), z.number(), z.null()]);

const ColumnSchema = z.object({
	name: z.string().min(1),
	type: z.enum(COLUMN_TYPES),
	primaryKey: z.boolean(),
	notNull: z.boolean(),
	default: SqlValueSchema
});

const TableDumpSchema = z.object({
	schema: z.object({
		name: z.string().min(1),
		columns: z.array(ColumnSchema).min(1)
	}),
	rows: z.array(z.record(SqlValueSchema))
});

export const DatabaseFileSchema = z.object({
	version: z.number().int(),
	created: z.string(),
	tables: z.array(TableDumpSchema)
});

export type DatabaseFile = z.infer<typeof DatabaseFileSchema>;

/**
 * Saves and restores a whole row store.
 */
export interface PersistenceEngine
{
	/**
	 * @returns Path of the written file
	 * @throws StorageError
	 */
	save(store: RowStore, filePath: string): string;

	/**
	 * Reads a file into a new store. The caller's store is never touched.
	 * @throws StorageError
	 */
	load(filePath: string): { store: MemoryRowStore; path: string };
}

/**
 * Adds the database file extension when the path has none.
 */
export function resolveDatabasePath(filePath: string): string
{
	return path.extname(filePath) === '' ? `${filePath}${FILE_EXTENSION}` : filePath;
}

/**
 * Synchronous JSON file persistence validated with zod on load.
 */
export class JsonStorage implements PersistenceEngine
{
	private readonly logger = getLogger('JsonStorage');

	save(store: RowStore, filePath: string): string
	{
		const target = resolveDatabasePath(filePath);
		const document: DatabaseFile = {
			version: FORMAT_VERSION,
			created: new Date().toISOString(),
			tables: store.collectionNames().flatMap(name =>
			{
				const collection = store.getCollection(name);
				if (!collection) return [];
				return [{
					schema: {
						name: collection.schema.name,
						columns: collection.schema.columns.map(c => ({
							name: c.name,
							type: c.type,
							primaryKey: c.primaryKey,
							notNull: c.notNull,
							default: c.defaultValue
						}))
					},
					rows: collection.rows.map(row => ({ ...row }))
				}];
			})
		};

		try
		{
			fs.writeFileSync(target, JSON.stringify(document, null, 2), 'utf8');
		}
		catch (error)
		{
			this.logger.error('Failed to write database file', { path: target, error: String(error) });
			throw new StorageError(`Cannot write database file '${target}'`, error);
		}

		this.logger.info('Database saved', { path: target, tables: document.tables.length });
		return target;
	}

	load(filePath: string): { store: MemoryRowStore; path: string }
	{
		const source = resolveDatabasePath(filePath);

		if (!fs.existsSync(source))
		{
			throw new StorageError(`Database file '${source}' not found`);
		}

		let raw: unknown;
		try
		{
			raw = JSON.parse(fs.readFileSync(source, 'utf8'));
		}
		catch (error)
		{
			this.logger.error('Failed to read database file', { path: source, error: String(error) });
			throw new StorageError(`Cannot read database file '${source}'`, error);
		}

		const parsed = DatabaseFileSchema.safeParse(raw);
		if (!parsed.success)
		{
			const issue = parsed.error.issues[0];
			const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
			throw new StorageError(`Invalid database file '${source}': ${issue.message}${where}`, parsed.error);
		}

		const document = parsed.data;
		if (document.version !== FORMAT_VERSION)
		{
			throw new StorageError(`Unsupported database file version ${document.version} in '${source}'`);
		}

		const store = new MemoryRowStore();
		for (const table of document.tables)
		{
			const schema = new TableSchema(
				table.schema.name,
				table.schema.columns.map(c => defineColumn(c.name, {
					type: c.type,
					primaryKey: c.primaryKey,
					notNull: c.notNull,
					defaultValue: c.default
				}))
			);

			if (store.hasCollection(schema.name))
			{
				throw new StorageError(`Duplicate table '${schema.name}' in '${source}'`);
			}
			store.createCollection(schema);

			for (const row of table.rows)
			{
				store.insertRow(schema.name, Object.fromEntries(schema.getColumnNames().map((c): [string, SqlValue] => [c, row[c] ?? null])));
			}
		}

		this.logger.info('Database loaded', { path: source, tables: document.tables.length });
		return { store, path: source };
	}
}
