import { QuerySyntaxError, SemanticError } from '../errors';
import { getLogger } from '../logger';
import { Stage, StageContext } from '../stage';
import { SqlValidator } from '../statements/sqlValidator';
import { RowStore } from '../storage/rowStore';
import { Payload, PayloadOf, success } from '../workUnit';
import { StatementParseStage } from './common';

/**
 * Parses `DROP TABLE [IF EXISTS] name`.
 */
export class DropTableParseStage extends StatementParseStage
{
	readonly id = 'drop-table-parse';
	protected readonly keyword = /^DROP\s+TABLE\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^DROP\s+TABLE\s+(IF\s+EXISTS\s+)?(\w+)$/i.exec(statement);
		if (!match)
		{
			throw new QuerySyntaxError(`Invalid DROP TABLE syntax: ${statement}`, 'DROP TABLE [IF EXISTS] name');
		}

		return {
			kind: 'dropTable',
			spec: {
				statement,
				table: SqlValidator.validateIdentifier(match[2], 'table'),
				ifExists: match[1] !== undefined
			}
		};
	}
}

export class DropTableExecuteStage extends Stage<'dropTable'>
{
	readonly id = 'drop-table-execute';
	protected readonly accepts = 'dropTable' as const;
	private readonly logger = getLogger('DropTableExecuteStage');

	constructor(private readonly store: RowStore)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'dropTable'>, context: StageContext): void
	{
		if (!this.store.hasCollection(spec.table))
		{
			if (!spec.ifExists)
			{
				throw new SemanticError(`Table '${spec.table}' does not exist`);
			}
			context.emit(success(`Table '${spec.table}' does not exist (skipped)`));
			return;
		}

		this.store.dropCollection(spec.table);
		this.logger.info('Table dropped', { table: spec.table });
		context.emit(success(`Table '${spec.table}' dropped`));
	}
}
