import { Payload, PayloadKind, PayloadOf, TerminalPayload, WorkUnit, isPayloadOf } from './workUnit';

/**
 * What a stage may do while transforming a unit.
 */
export interface StageContext
{
	/** Id of the dispatcher run; becomes the origin of emitted units */
	readonly origin: string;

	/** Queues a new unit carrying `payload` */
	emit(payload: Payload): void;

	/** Stores the run's result. A later call replaces an earlier one. */
	complete(result: TerminalPayload): void;
}

/**
 * Capability pair the dispatcher needs from a stage. Bookkeeping keys on `id`.
 */
export interface PipelineStage
{
	readonly id: string;

	matches(unit: WorkUnit): boolean;

	/**
	 * Processes a unit previously accepted by `matches`. May emit zero or
	 * more units, or throw a QueryEngineError which the dispatcher turns
	 * into a terminal error.
	 */
	transform(unit: WorkUnit, context: StageContext): void;
}

/**
 * Base class for stages bound to a single payload kind. Subclasses get the
 * payload already narrowed to that kind.
 */
export abstract class Stage<K extends PayloadKind = PayloadKind> implements PipelineStage
{
	abstract readonly id: string;

	/** Payload kind this stage handles */
	protected abstract readonly accepts: K;

	matches(unit: WorkUnit): boolean
	{
		const payload = unit.payload;
		return isPayloadOf(payload, this.accepts) && this.applies(payload);
	}

	transform(unit: WorkUnit, context: StageContext): void
	{
		const payload = unit.payload;
		if (!isPayloadOf(payload, this.accepts))
		{
			throw new Error(`Stage '${this.id}' cannot transform a '${payload.kind}' payload`);
		}
		this.process(payload, context);
	}

	/**
	 * Further applicability test on a payload of the right kind.
	 */
	protected applies(_payload: PayloadOf<K>): boolean
	{
		return true;
	}

	protected abstract process(payload: PayloadOf<K>, context: StageContext): void;
}
