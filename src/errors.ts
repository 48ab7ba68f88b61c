/**
 * Error categories that surface as terminal results rather than exceptions.
 */
export type ErrorCategory = 'syntax' | 'semantic' | 'exhaustion' | 'storage';

/**
 * Base class for recoverable engine errors. Stages convert these into
 * terminal error results; they never escape a dispatch run.
 */
export class QueryEngineError extends Error
{
	override readonly name: string = 'QueryEngineError';

	constructor(
		readonly category: ErrorCategory,
		message: string,
		override readonly cause?: unknown
	)
	{
		super(message);
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * Malformed statement or clause.
 */
export class QuerySyntaxError extends QueryEngineError
{
	override readonly name = 'QuerySyntaxError';

	/**
	 * @param message What was wrong, quoting the offending fragment
	 * @param expected Grammar hint appended on a second line
	 */
	constructor(message: string, readonly expected?: string)
	{
		super('syntax', expected ? `${message}\nExpected: ${expected}` : message);
	}
}

/**
 * Well-formed statement that does not fit the current schema or data.
 */
export class SemanticError extends QueryEngineError
{
	override readonly name = 'SemanticError';

	constructor(message: string)
	{
		super('semantic', message);
	}
}

/**
 * Persistence failure (missing file, unreadable or incompatible dump).
 */
export class StorageError extends QueryEngineError
{
	override readonly name = 'StorageError';

	constructor(message: string, cause?: unknown)
	{
		super('storage', message, cause);
	}
}

/**
 * Fatal: the dispatcher dequeued more units than its budget allows.
 * Indicates a stage cycle, never bad user input.
 */
export class IterationLimitError extends Error
{
	override readonly name = 'IterationLimitError';

	constructor(readonly maxIterations: number)
	{
		super(`Dispatcher exceeded maximum iterations (${maxIterations}). Possible infinite loop detected.`);
		Object.setPrototypeOf(this, new.target.prototype);
	}
}
