import type { ErrorCategory } from './errors';

/**
 * Outcome of executing one statement.
 */
export interface ExecutionResult
{
	status: 'success' | 'error';
	/** Result text; errors start with `ERROR: ` */
	text: string;
	/** Set on errors */
	category?: ErrorCategory;
	/** Dequeues the dispatcher spent on the statement */
	iterations: number;
}

/**
 * Middlewares can intercept a statement before it reaches the dispatcher.
 * @param statement The incoming statement text.
 * @param next Executes the statement (possibly rewritten) through the rest of the chain.
 * @returns The execution result, from `next` or produced directly.
 */
export type StatementMiddleware = (statement: string, next: (statement: string) => ExecutionResult) => ExecutionResult;

/**
 * Composes and executes a chain of middleware functions for a given statement.
 * @param middlewares An array of middleware functions to run.
 * @param statement The initial statement text.
 * @param final The function to call after all middlewares have been executed.
 * @returns The final execution result.
 */
export function runMiddlewares(
	middlewares: readonly StatementMiddleware[],
	statement: string,
	final: (statement: string) => ExecutionResult
): ExecutionResult
{
	if (middlewares.length === 0) { return final(statement); }

	let idx = -1;
	function dispatch(i: number, s: string): ExecutionResult
	{
		if (i <= idx) throw new Error('middleware: next() called multiple times');
		idx = i;
		const mw = middlewares[i];
		if (!mw)
			return final(s);

		return mw(s, (nextStatement) => dispatch(i + 1, nextStatement));
	}

	return dispatch(0, statement);
}
