/**
 * @file The engine facade: one dispatcher run per statement against a
 * shared row store.
 */

import { ResolvedConfig, QueryEngineConfig, resolveConfig } from './config';
import { DispatchReport, Dispatcher } from './dispatcher';
import { getLogger, globalLogger } from './logger';
import { ExecutionResult, runMiddlewares } from './middleware';
import { createDefaultPipeline } from './pipeline';
import { splitTopLevel } from './statements/textScanner';
import { RowStore } from './storage/rowStore';
import { TerminalPayload, WorkUnit, describePayload, failure } from './workUnit';

/**
 * Executes statements and returns one textual result per statement.
 *
 * @example
 * ```typescript
 * const engine = new QueryEngine();
 * engine.execute('CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT)');
 * engine.execute("INSERT INTO users VALUES (1, 'Alice')");
 * console.log(engine.execute('SELECT name FROM users WHERE id = 1'));
 * ```
 */
export class QueryEngine
{
	private readonly config: ResolvedConfig;
	private readonly logger = getLogger('QueryEngine');
	private lastReport: DispatchReport | undefined;

	constructor(config: QueryEngineConfig = {})
	{
		this.config = resolveConfig(config);
		if (this.config.logLevel !== undefined)
		{
			globalLogger.setLevel(this.config.logLevel);
		}
	}

	getStore(): RowStore
	{
		return this.config.store;
	}

	/**
	 * Report of the most recent dispatcher run.
	 */
	getLastReport(): DispatchReport | undefined
	{
		return this.lastReport;
	}

	/**
	 * Executes a statement and returns its result text.
	 * @throws IterationLimitError if the pipeline cycles
	 */
	execute(statement: string): string
	{
		return this.run(statement).text;
	}

	/**
	 * Executes a statement through the middleware chain.
	 * @throws IterationLimitError if the pipeline cycles
	 */
	run(statement: string): ExecutionResult
	{
		return runMiddlewares(this.config.middlewares, statement, s => this.dispatch(s));
	}

	/**
	 * Splits a script on semicolons outside quoted literals and runs each
	 * non-empty statement in order. Errors do not stop the script.
	 */
	executeScript(script: string): ExecutionResult[]
	{
		return splitTopLevel(script, ';')
			.filter(statement => statement !== '')
			.map(statement => this.run(statement));
	}

	private dispatch(statement: string): ExecutionResult
	{
		const dispatcher = new Dispatcher({
			maxIterations: this.config.maxIterations,
			recordHistory: this.config.recordHistory
		});
		for (const stage of createDefaultPipeline(this.config.store, this.config.storage))
		{
			dispatcher.register(stage);
		}

		dispatcher.emit({ kind: 'statement', text: statement });
		const result = dispatcher.run() ?? this.exhaustion(dispatcher.getUnprocessable()[0]);
		this.lastReport = dispatcher.getReport();

		if (result.status === 'error')
		{
			this.logger.warn('Statement failed', { statement, category: result.category, error: result.text });
		}
		else
		{
			this.logger.debug('Statement executed', { statement, iterations: dispatcher.getIterations() });
		}

		return {
			status: result.status,
			text: result.text,
			category: result.category,
			iterations: dispatcher.getIterations()
		};
	}

	/**
	 * Error for a run that ended without a result because no stage took a unit.
	 */
	private exhaustion(unit: WorkUnit | undefined): TerminalPayload
	{
		if (!unit || !this.config.verboseErrors)
		{
			return failure('exhaustion', 'Invalid SQL syntax');
		}

		const lines = [
			'No stage accepted the statement',
			`Input: ${describePayload(unit.payload)}`,
			`Origin: ${unit.origin}`,
			`Stages attempted: ${unit.trace.totalStages}`,
			'Declined by:',
			...unit.declinedBy.map(id => `  - ${id}`)
		];
		if (unit.transformedBy.length > 0)
		{
			lines.push('Transformed by:', ...unit.transformedBy.map(id => `  - ${id}`));
		}

		return failure('exhaustion', lines.join('\n'));
	}
}
