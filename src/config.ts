import { DEFAULT_MAX_ITERATIONS } from './dispatcher';
import { LogLevel } from './logger';
import { StatementMiddleware } from './middleware';
import { JsonStorage, PersistenceEngine } from './storage/jsonStorage';
import { MemoryRowStore, RowStore } from './storage/rowStore';

/**
 * Query engine configuration options. Every field is optional.
 */
export interface QueryEngineConfig
{
	/** Dequeues allowed per statement before the run is aborted (default: 1000) */
	maxIterations?: number;
	/**
	 * List the declining stages when no stage accepts a statement (default: true).
	 * When false the error reads `ERROR: Invalid SQL syntax`.
	 */
	verboseErrors?: boolean;
	/** Keep before/after snapshots on work units (default: false) */
	recordHistory?: boolean;
	/** Applied to the global logger when the engine is created */
	logLevel?: LogLevel;
	/** Table storage (default: a new MemoryRowStore) */
	store?: RowStore;
	/** SAVE/LOAD DATABASE backend (default: JsonStorage) */
	storage?: PersistenceEngine;
	/** Run around every statement, first to last */
	middlewares?: StatementMiddleware[];
}

export type ResolvedConfig = Required<Omit<QueryEngineConfig, 'logLevel'>> & Pick<QueryEngineConfig, 'logLevel'>;

/**
 * Fills in the defaults.
 */
export function resolveConfig(config: QueryEngineConfig = {}): ResolvedConfig
{
	return {
		maxIterations: config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		verboseErrors: config.verboseErrors ?? true,
		recordHistory: config.recordHistory ?? false,
		logLevel: config.logLevel,
		store: config.store ?? new MemoryRowStore(),
		storage: config.storage ?? new JsonStorage(),
		middlewares: config.middlewares ?? []
	};
}
