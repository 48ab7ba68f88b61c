/**
 * Typed intermediate forms produced by the statement parse stages and
 * consumed by the execution stages. Each is built once from a statement's
 * text and never modified afterwards.
 *
 * @module statements/statementSpec
 */

import { PredicateTree } from '../predicate/types';
import { TableSchema } from '../storage/schema';
import { SqlValue } from '../values';

/** CREATE TABLE [IF NOT EXISTS] */
export interface CreateTableSpec
{
	readonly statement: string;
	readonly schema: TableSchema;
	readonly ifNotExists: boolean;
}

/** DROP TABLE [IF EXISTS] */
export interface DropTableSpec
{
	readonly statement: string;
	readonly table: string;
	readonly ifExists: boolean;
}

/**
 * INSERT INTO. Without a column list every tuple is positional and must
 * cover the whole schema.
 */
export interface InsertSpec
{
	readonly statement: string;
	readonly table: string;
	/** Explicit column list, or undefined for positional tuples */
	readonly columns?: readonly string[];
	/** One entry per VALUES tuple */
	readonly tuples: readonly (readonly SqlValue[])[];
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderSpec
{
	readonly column: string;
	readonly direction: SortDirection;
}

/** SELECT */
export interface SelectSpec
{
	readonly statement: string;
	readonly table: string;
	/** Requested columns in output order; empty means `*` */
	readonly columns: readonly string[];
	readonly distinct: boolean;
	readonly where?: PredicateTree;
	readonly orderBy?: OrderSpec;
	readonly limit?: number;
	readonly offset?: number;
}

/** UPDATE ... SET */
export interface UpdateSpec
{
	readonly statement: string;
	readonly table: string;
	/** Column to new value, in SET order */
	readonly assignments: Readonly<Record<string, SqlValue>>;
	readonly where?: PredicateTree;
}

/** DELETE FROM */
export interface DeleteSpec
{
	readonly statement: string;
	readonly table: string;
	readonly where?: PredicateTree;
}

/** SAVE DATABASE / LOAD DATABASE */
export interface PersistSpec
{
	readonly statement: string;
	readonly action: 'save' | 'load';
	readonly path: string;
}
