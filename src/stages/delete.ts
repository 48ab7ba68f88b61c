import { QuerySyntaxError } from '../errors';
import { getLogger } from '../logger';
import { evaluatePredicate } from '../predicate/evaluator';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { RowStore } from '../storage/rowStore';
import { Payload, PayloadOf, success } from '../workUnit';
import {
	StatementParseStage, assertPredicateColumns, parseWhere, requireCollection, rowCount
} from './common';

/**
 * Parses `DELETE FROM name [WHERE condition]`.
 */
export class DeleteParseStage extends StatementParseStage
{
	readonly id = 'delete-parse';
	protected readonly keyword = /^DELETE\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^DELETE\s+FROM\s+(\w+)(?:\s+WHERE(?=\s|$)([\s\S]*))?$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid DELETE syntax: ${statement}`, 'DELETE FROM name [WHERE condition]');
		}

		return {
			kind: 'delete',
			spec: {
				statement,
				table: SqlValidator.validateIdentifier(match[1], 'table'),
				where: parseWhere(match[2])
			}
		};
	}
}

export class DeleteExecuteStage extends Stage<'delete'>
{
	readonly id = 'delete-execute';
	protected readonly accepts = 'delete' as const;
	private readonly logger = getLogger('DeleteExecuteStage');

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'delete'>, context: StageContext): void
	{
		const { schema } = requireCollection(this.store, spec.table);
		assertPredicateColumns(schema, spec.where);

		const where = spec.where;
		const count = this.store.deleteRows(spec.table, where ? row => evaluatePredicate(where, row) : undefined);

		this.logger.info('Rows deleted', { table: spec.table, count });
		context.emit(success(`${rowCount(count)} deleted`));
	}
}
