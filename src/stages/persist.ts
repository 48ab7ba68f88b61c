import { QuerySyntaxError } from '../errors';
import { Stage, StageContext } from '../stage';
import { PersistenceEngine } from '../storage/jsonStorage';
import { RowStore } from '../storage/rowStore';
import { unquote } from '../values';
import { Payload, PayloadOf, success } from '../workUnit';
import { StatementParseStage } from './common';

/**
 * Parses `SAVE DATABASE 'path'` and `LOAD DATABASE 'path'`.
 */
export class PersistParseStage extends StatementParseStage
{
	readonly id = 'persist-parse';
	protected readonly keyword = /^(SAVE|LOAD)\s+DATABASE\b/i;

	protected parse(statement: string): Payload
	{
		const match = /^(SAVE|LOAD)\s+DATABASE\s+(\S[\s\S]*)$/i.exec(statement);
		const filePath = match ? unquote(match[2]) : undefined;
		if (!match || !filePath)
		{
			throw new QuerySyntaxError(`Invalid database path in: ${statement}`, "SAVE DATABASE 'path' | LOAD DATABASE 'path'");
		}

		return {
			kind: 'persist',
			spec: { statement, action: match[1].toUpperCase() === 'SAVE' ? 'save' : 'load', path: filePath }
		};
	}
}

/**
 * Saves the store, or replaces its contents with a loaded file. A file
 * that fails to load leaves the store as it was.
 */
export class PersistExecuteStage extends Stage<'persist'>
{
	readonly id = 'persist-execute';
	protected readonly accepts = 'persist' as const;

	constructor(
		private readonly store: RowStore,
		private readonly storage: PersistenceEngine
	)
	{
		super();
	}

	protected process({ spec }: PayloadOf<'persist'>, context: StageContext): void
	{
		if (spec.action === 'save')
		{
			const written = this.storage.save(this.store, spec.path);
			context.emit(success(`Database saved to '${written}'`));
			return;
		}

		const loaded = this.storage.load(spec.path);
		const names = loaded.store.collectionNames();

		this.store.clear();
		for (const name of names)
		{
			const collection = loaded.store.getCollection(name);
			if (!collection) continue;
			this.store.createCollection(collection.schema);
			for (const row of collection.rows)
			{
				this.store.insertRow(name, row);
			}
		}

		context.emit(success(`Database loaded from '${loaded.path}' (${names.length} table${names.length === 1 ? '' : 's'})`));
	}
}
