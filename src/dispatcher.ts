/**
 * Dispatcher - drains a queue of work units through an ordered list of stages.
 *
 * For every dequeued unit the stages are tried in registration order; the
 * first one whose `matches` returns true transforms it and the scan stops.
 * Every stage passed over records a decline on the unit. A unit nobody
 * accepts is kept as unprocessable. Stages talk to each other only by
 * emitting new units, so the run is bounded by an iteration budget.
 *
 * @module dispatcher
 */

import { v4 as uuidv4 } from 'uuid';
import { IterationLimitError, QueryEngineError } from './errors';
import { getLogger } from './logger';
import { PipelineStage, StageContext } from './stage';
import { Payload, TerminalPayload, WorkUnit, describePayload, failure } from './workUnit';

export const DEFAULT_MAX_ITERATIONS = 1000;

export interface DispatcherOptions
{
	/** Maximum number of dequeues per run (default: 1000) */
	maxIterations?: number;
	/** Keep before/after snapshots on every unit (default: false) */
	recordHistory?: boolean;
	/** Run id used as the origin of emitted units (default: random UUID) */
	id?: string;
}

/**
 * Snapshot of a finished (or failed) run.
 */
export interface DispatchReport
{
	id: string;
	iterations: number;
	stages: string[];
	result?: TerminalPayload;
	unprocessable: {
		payload: string;
		declinedBy: string[];
		transformedBy: string[];
	}[];
}

export class Dispatcher
{
	readonly id: string;
	private readonly logger = getLogger('Dispatcher');
	private readonly maxIterations: number;
	private readonly recordHistory: boolean;
	private readonly stages: PipelineStage[] = [];
	private readonly queue: WorkUnit[] = [];
	private readonly unprocessable: WorkUnit[] = [];
	private result: TerminalPayload | undefined;
	private iterations = 0;

	constructor(options: DispatcherOptions = {})
	{
		this.id = options.id ?? uuidv4();
		this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
		this.recordHistory = options.recordHistory ?? false;

		if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1)
		{
			throw new Error(`maxIterations must be a positive integer, got ${this.maxIterations}`);
		}
	}

	/**
	 * Appends a stage. Order matters: the first applicable stage wins.
	 * @throws Error if a stage with the same id is already registered
	 */
	register(stage: PipelineStage): this
	{
		if (this.stages.some(s => s.id === stage.id))
		{
			throw new Error(`Stage '${stage.id}' is already registered`);
		}
		this.stages.push(stage);
		return this;
	}

	getStages(): readonly PipelineStage[]
	{
		return this.stages;
	}

	/**
	 * Enqueues a unit for the next run.
	 */
	submit(unit: WorkUnit): void
	{
		this.queue.push(unit);
	}

	/**
	 * Wraps a payload into a unit originating from this dispatcher and enqueues it.
	 */
	emit(payload: Payload): void
	{
		this.submit(new WorkUnit(payload, this.id));
	}

	/**
	 * Stores the run's result; last write wins.
	 */
	complete(result: TerminalPayload): void
	{
		if (this.result)
		{
			this.logger.debug('Replacing earlier result', { previous: this.result.text, next: result.text });
		}
		this.result = result;
	}

	/**
	 * Drains the queue.
	 * @returns The captured result, if any stage completed the run
	 * @throws IterationLimitError when more units remain after the budget is spent
	 */
	run(): TerminalPayload | undefined
	{
		this.iterations = 0;

		while (this.queue.length > 0)
		{
			if (this.iterations >= this.maxIterations)
			{
				this.logger.error('Iteration budget exceeded', {
					id: this.id,
					maxIterations: this.maxIterations,
					pending: this.queue.length
				});
				throw new IterationLimitError(this.maxIterations);
			}

			const unit = this.queue.shift();
			if (!unit) break;
			this.iterations++;
			this.dispatch(unit);
		}

		return this.result;
	}

	getResult(): TerminalPayload | undefined
	{
		return this.result;
	}

	/**
	 * Units that every stage declined, in the order they were given up on.
	 */
	getUnprocessable(): readonly WorkUnit[]
	{
		return this.unprocessable;
	}

	getIterations(): number
	{
		return this.iterations;
	}

	getReport(): DispatchReport
	{
		return {
			id: this.id,
			iterations: this.iterations,
			stages: this.stages.map(s => s.id),
			result: this.result,
			unprocessable: this.unprocessable.map(unit => ({
				payload: describePayload(unit.payload),
				declinedBy: [...unit.declinedBy],
				transformedBy: [...unit.transformedBy]
			}))
		};
	}

	private dispatch(unit: WorkUnit): void
	{
		unit.enterPass(this.stages.length);
		this.logger.debug('Dispatching unit', { iteration: this.iterations, payload: describePayload(unit.payload) });

		for (const stage of this.stages)
		{
			if (stage.matches(unit))
			{
				this.apply(stage, unit);
				return;
			}
			unit.decline(stage.id);
		}

		if (unit.isExhausted())
		{
			this.logger.warn('No stage accepted unit', {
				payload: describePayload(unit.payload),
				declinedBy: unit.declinedBy
			});
			this.unprocessable.push(unit);
		}
	}

	private apply(stage: PipelineStage, unit: WorkUnit): void
	{
		const emitted: Payload[] = [];
		const context: StageContext = {
			origin: this.id,
			emit: payload =>
			{
				emitted.push(payload);
				this.emit(payload);
			},
			complete: result => this.complete(result)
		};

		try
		{
			stage.transform(unit, context);
		}
		catch (error)
		{
			if (!(error instanceof QueryEngineError))
			{
				throw error;
			}
			this.logger.debug('Stage reported an error', { stage: stage.id, category: error.category, message: error.message });
			context.emit(failure(error.category, error.message));
		}

		unit.recordTransform(stage.id, emitted, this.recordHistory);
		this.logger.debug('Unit transformed', { stage: stage.id, emitted: emitted.length });
	}
}
