import { describe, it, expect } from 'vitest';
import { RowSetPhase, WorkUnit, describePayload, failure, isPayloadOf, success } from './workUnit';

describe('WorkUnit', () =>
{
	it('should start with an empty trace', () =>
	{
		const unit = new WorkUnit({ kind: 'statement', text: 'SELECT 1' }, 'run-1');

		expect(unit.origin).toBe('run-1');
		expect(unit.trace).toEqual({ declinedBy: [], transformedBy: [], totalStages: 0, history: [] });
	});

	it('should record each decline once', () =>
	{
		const unit = new WorkUnit({ kind: 'statement', text: 'x' }, 'run-1');
		unit.enterPass(2);

		unit.decline('a');
		unit.decline('a');
		expect(unit.declinedBy).toEqual(['a']);
		expect(unit.isExhausted()).toBe(false);

		unit.decline('b');
		expect(unit.isExhausted()).toBe(true);
	});

	it('should replace the trace instead of mutating it', () =>
	{
		const unit = new WorkUnit({ kind: 'statement', text: 'x' }, 'run-1');
		const before = unit.trace;

		unit.decline('a');

		expect(before.declinedBy).toEqual([]);
		expect(unit.trace).not.toBe(before);
	});

	it('should only keep history when asked to', () =>
	{
		const unit = new WorkUnit({ kind: 'statement', text: 'DROP TABLE t' }, 'run-1');

		unit.recordTransform('drop-table-parse', [], false);
		expect(unit.transformedBy).toEqual(['drop-table-parse']);
		expect(unit.trace.history).toEqual([]);

		unit.recordTransform('again', [success('done'), failure('semantic', 'bad')], true);
		expect(unit.trace.history).toHaveLength(1);
		expect(unit.trace.history[0]).toMatchObject({
			stage: 'again',
			before: 'DROP TABLE t',
			after: 'success: done | error: ERROR: bad'
		});
	});
});

describe('payload helpers', () =>
{
	it('should build terminal payloads', () =>
	{
		expect(success('Table \'t\' created')).toEqual({ kind: 'terminal', status: 'success', text: 'Table \'t\' created' });
		expect(failure('syntax', 'Bad')).toEqual({ kind: 'terminal', status: 'error', category: 'syntax', text: 'ERROR: Bad' });
	});

	it('should narrow by kind', () =>
	{
		const payload = success('ok');
		expect(isPayloadOf(payload, 'terminal')).toBe(true);
		expect(isPayloadOf(payload, 'statement')).toBe(false);
	});

	it('should describe statement payloads by their statement text', () =>
	{
		expect(describePayload({
			kind: 'delete',
			spec: { statement: 'DELETE FROM t', table: 't' }
		})).toBe('delete: DELETE FROM t');

		expect(describePayload({
			kind: 'rowSet',
			rowSet: {
				rows: [{ id: 1 }],
				columns: ['id'],
				phase: RowSetPhase.Sorted,
				select: { statement: 'SELECT id FROM t', table: 't', columns: ['id'], distinct: false }
			}
		})).toBe('rowSet[Sorted] 1 rows of t');
	});
});
