/**
 * Relational operators over row-sets.
 *
 * Each operator applies to a row-set whose phase is earlier than its own
 * and whose SELECT asks for it, and re-emits the row-set tagged with its
 * phase. Registered in phase order the chain runs
 * filter, order, project, distinct, limit; the result-set stage renders
 * whatever reaches it.
 */

import { evaluatePredicate } from '../predicate/evaluator';
import { Stage, StageContext } from '../stage';
import { SelectSpec } from '../statements/statementSpec';
import { Row, SqlValue, compareValues, formatValue } from '../values';
import { PayloadOf, RowSet, RowSetPhase, success } from '../workUnit';

abstract class RowSetOperatorStage extends Stage<'rowSet'>
{
	protected readonly accepts = 'rowSet' as const;

	/** Phase this operator tags its output with */
	protected abstract readonly phase: RowSetPhase;

	protected abstract requiredBy(select: SelectSpec): boolean;

	protected abstract operate(rowSet: RowSet): readonly Row[];

	protected override applies({ rowSet }: PayloadOf<'rowSet'>): boolean
	{
		return rowSet.phase < this.phase && this.requiredBy(rowSet.select);
	}

	protected process({ rowSet }: PayloadOf<'rowSet'>, context: StageContext): void
	{
		context.emit({ kind: 'rowSet', rowSet: { ...rowSet, rows: this.operate(rowSet), phase: this.phase } });
	}
}

/** WHERE */
export class FilterStage extends RowSetOperatorStage
{
	readonly id = 'filter';
	protected readonly phase = RowSetPhase.Filtered;

	protected requiredBy(select: SelectSpec): boolean
	{
		return select.where !== undefined;
	}

	protected operate({ rows, select }: RowSet): readonly Row[]
	{
		const where = select.where;
		return where ? rows.filter(row => evaluatePredicate(where, row)) : rows;
	}
}

/**
 * ORDER BY. Stable; NULLs sort last in either direction. Runs before
 * projection so the sort column need not be selected.
 */
export class OrderStage extends RowSetOperatorStage
{
	readonly id = 'order-by';
	protected readonly phase = RowSetPhase.Sorted;

	protected requiredBy(select: SelectSpec): boolean
	{
		return select.orderBy !== undefined;
	}

	protected operate({ rows, select }: RowSet): readonly Row[]
	{
		const order = select.orderBy;
		if (!order) return rows;

		const sign = order.direction === 'DESC' ? -1 : 1;
		return [...rows].sort((a, b) =>
		{
			const left = a[order.column] ?? null;
			const right = b[order.column] ?? null;
			if (left === null || right === null)
			{
				return left === right ? 0 : left === null ? 1 : -1;
			}
			return sign * compareValues(left, right);
		});
	}
}

/** Narrows each row to the requested columns. Skipped for `*`. */
export class ProjectStage extends RowSetOperatorStage
{
	readonly id = 'projection';
	protected readonly phase = RowSetPhase.Projected;

	protected requiredBy(select: SelectSpec): boolean
	{
		return select.columns.length > 0;
	}

	protected operate({ rows, columns }: RowSet): readonly Row[]
	{
		return rows.map(row =>
			Object.freeze(Object.fromEntries(columns.map((c): [string, SqlValue] => [c, row[c] ?? null])))
		);
	}
}

/** DISTINCT over the output columns; keeps the first occurrence. */
export class DistinctStage extends RowSetOperatorStage
{
	readonly id = 'distinct';
	protected readonly phase = RowSetPhase.Distinct;

	protected requiredBy(select: SelectSpec): boolean
	{
		return select.distinct;
	}

	protected operate({ rows, columns }: RowSet): readonly Row[]
	{
		const seen = new Set<string>();
		return rows.filter(row =>
		{
			const signature = JSON.stringify(columns.map(c => row[c] ?? null));
			if (seen.has(signature)) return false;
			seen.add(signature);
			return true;
		});
	}
}

/** LIMIT / OFFSET */
export class LimitStage extends RowSetOperatorStage
{
	readonly id = 'limit';
	protected readonly phase = RowSetPhase.Limited;

	protected requiredBy(select: SelectSpec): boolean
	{
		return select.limit !== undefined || select.offset !== undefined;
	}

	protected operate({ rows, select }: RowSet): readonly Row[]
	{
		const start = select.offset ?? 0;
		return select.limit === undefined ? rows.slice(start) : rows.slice(start, start + select.limit);
	}
}

/**
 * Renders a row-set as the tabular result text:
 *
 * ```
 * 2 rows returned
 *
 * id	name
 * --------------
 * 1	Alice
 * 2	NULL
 * ```
 *
 * The rule is as long as the header plus three per column.
 */
export function formatResultSet(columns: readonly string[], rows: readonly Row[]): string
{
	if (rows.length === 0) return '0 rows returned';

	const header = columns.join('\t');
	const lines = [
		`${rows.length} row${rows.length === 1 ? '' : 's'} returned`,
		'',
		header,
		'-'.repeat(header.length + columns.length * 3),
		...rows.map(row => columns.map(c => formatValue(row[c] ?? null)).join('\t'))
	];
	return lines.join('\n');
}

/**
 * Turns the row-set into the run's result. Register after every operator.
 */
export class ResultSetStage extends Stage<'rowSet'>
{
	readonly id = 'result-set';
	protected readonly accepts = 'rowSet' as const;

	protected process({ rowSet }: PayloadOf<'rowSet'>, context: StageContext): void
	{
		context.emit(success(formatResultSet(rowSet.columns, rowSet.rows)));
	}
}
