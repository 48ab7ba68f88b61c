/**
 * Work units: the payloads that move through the dispatcher together with
 * their decline/transform bookkeeping.
 *
 * @module workUnit
 */

import { ErrorCategory } from './errors';
import {
	CreateTableSpec, DeleteSpec, DropTableSpec, InsertSpec, PersistSpec, SelectSpec, UpdateSpec
} from './statements/statementSpec';
import { Row } from './values';

/**
 * Relational operators a row-set has passed through, in pipeline order.
 * An operator stage only accepts row-sets tagged with an earlier phase.
 */
export enum RowSetPhase
{
	Scanned = 0,
	Filtered = 1,
	Sorted = 2,
	Projected = 3,
	Distinct = 4,
	Limited = 5
}

/**
 * Rows produced by a scan, threaded through the relational operators.
 * Rows are shared references; operators only subset or reorder them,
 * except projection which builds narrowed copies.
 */
export interface RowSet
{
	readonly rows: readonly Row[];
	/** Columns to render, in output order */
	readonly columns: readonly string[];
	/** The SELECT that produced this row-set */
	readonly select: SelectSpec;
	readonly phase: RowSetPhase;
}

/**
 * Final answer of a dispatch run.
 */
export interface TerminalPayload
{
	readonly kind: 'terminal';
	readonly status: 'success' | 'error';
	readonly category?: ErrorCategory;
	readonly text: string;
}

/**
 * Everything a work unit can carry. Raw statements enter as `statement`;
 * parse stages turn them into the typed specs; execution and relational
 * stages finish with a `terminal` payload.
 */
export type Payload =
	| { readonly kind: 'statement'; readonly text: string }
	| { readonly kind: 'createTable'; readonly spec: CreateTableSpec }
	| { readonly kind: 'dropTable'; readonly spec: DropTableSpec }
	| { readonly kind: 'insert'; readonly spec: InsertSpec }
	| { readonly kind: 'select'; readonly spec: SelectSpec }
	| { readonly kind: 'update'; readonly spec: UpdateSpec }
	| { readonly kind: 'delete'; readonly spec: DeleteSpec }
	| { readonly kind: 'persist'; readonly spec: PersistSpec }
	| { readonly kind: 'rowSet'; readonly rowSet: RowSet }
	| TerminalPayload;

export type PayloadKind = Payload['kind'];

export type PayloadOf<K extends PayloadKind> = Extract<Payload, { kind: K }>;

export function isPayloadOf<K extends PayloadKind>(payload: Payload, kind: K): payload is PayloadOf<K>
{
	return payload.kind === kind;
}

/**
 * Builds a successful terminal payload.
 */
export function success(text: string): TerminalPayload
{
	return { kind: 'terminal', status: 'success', text };
}

/**
 * Builds an error terminal payload; the text gets the `ERROR: ` prefix.
 */
export function failure(category: ErrorCategory, message: string): TerminalPayload
{
	return { kind: 'terminal', status: 'error', category, text: `ERROR: ${message}` };
}

/**
 * One-line summary of a payload for logs, history and error reports.
 */
export function describePayload(payload: Payload): string
{
	switch (payload.kind)
	{
		case 'statement':
			return payload.text;
		case 'terminal':
			return `${payload.status}: ${payload.text}`;
		case 'rowSet':
			return `rowSet[${RowSetPhase[payload.rowSet.phase]}] ${payload.rowSet.rows.length} rows of ${payload.rowSet.select.table}`;
		default:
			return `${payload.kind}: ${payload.spec.statement}`;
	}
}

export interface TransformRecord
{
	stage: string;
	before: string;
	after: string;
	timestamp: number;
}

/**
 * Bookkeeping carried beside a payload. Never mutated; every update
 * replaces the whole object.
 */
export interface UnitTrace
{
	/** Stages that looked at the unit and declined it, without duplicates */
	readonly declinedBy: readonly string[];
	/** Stages that processed the unit, in order */
	readonly transformedBy: readonly string[];
	/** Pipeline length for the current pass */
	readonly totalStages: number;
	/** Before/after snapshots, only kept when history recording is on */
	readonly history: readonly TransformRecord[];
}

const EMPTY_TRACE: UnitTrace = { declinedBy: [], transformedBy: [], totalStages: 0, history: [] };

/**
 * Immutable payload plus its trace.
 */
export class WorkUnit<P extends Payload = Payload>
{
	private currentTrace: UnitTrace = EMPTY_TRACE;

	constructor(
		readonly payload: P,
		/** Id of the dispatcher run that emitted this unit */
		readonly origin: string
	)
	{
	}

	get trace(): UnitTrace
	{
		return this.currentTrace;
	}

	get declinedBy(): readonly string[]
	{
		return this.currentTrace.declinedBy;
	}

	get transformedBy(): readonly string[]
	{
		return this.currentTrace.transformedBy;
	}

	/**
	 * Starts a pass over a pipeline of `stageCount` stages.
	 */
	enterPass(stageCount: number): void
	{
		this.currentTrace = { ...this.currentTrace, totalStages: stageCount };
	}

	/**
	 * Records that a stage declined the unit. Repeated declines are no-ops.
	 */
	decline(stageId: string): void
	{
		if (this.currentTrace.declinedBy.includes(stageId)) return;
		this.currentTrace = { ...this.currentTrace, declinedBy: [...this.currentTrace.declinedBy, stageId] };
	}

	/**
	 * Declined by as many stages as the current pass has.
	 */
	isExhausted(): boolean
	{
		return this.currentTrace.declinedBy.length === this.currentTrace.totalStages;
	}

	/**
	 * Records that a stage processed the unit, optionally with a snapshot
	 * of what it produced.
	 */
	recordTransform(stageId: string, after: readonly Payload[], keepHistory: boolean): void
	{
		const history = keepHistory
			? [...this.currentTrace.history, {
				stage: stageId,
				before: describePayload(this.payload),
				after: after.map(describePayload).join(' | '),
				timestamp: Date.now()
			}]
			: this.currentTrace.history;

		this.currentTrace = {
			...this.currentTrace,
			transformedBy: [...this.currentTrace.transformedBy, stageId],
			history
		};
	}
}
