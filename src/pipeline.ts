import { PipelineStage } from './stage';
import { CreateTableExecuteStage, CreateTableParseStage } from './stages/createTable';
import { DeleteExecuteStage, DeleteParseStage } from './stages/delete';
import { DropTableExecuteStage, DropTableParseStage } from './stages/dropTable';
import { InsertExecuteStage, InsertParseStage } from './stages/insert';
import { PersistExecuteStage, PersistParseStage } from './stages/persist';
import {
	DistinctStage, FilterStage, LimitStage, OrderStage, ProjectStage, ResultSetStage
} from './stages/relational';
import { ResultStage } from './stages/resultStage';
import { SelectParseStage, TableScanStage } from './stages/select';
import { UpdateExecuteStage, UpdateParseStage } from './stages/update';
import { PersistenceEngine } from './storage/jsonStorage';
import { RowStore } from './storage/rowStore';

/**
 * The stage list every statement runs through, in registration order.
 * The relational operators must stay in phase order and the result stage last.
 */
export function createDefaultPipeline(store: RowStore, storage: PersistenceEngine): PipelineStage[]
{
	return [
		new CreateTableParseStage(),
		new CreateTableExecuteStage(store),
		new DropTableParseStage(),
		new DropTableExecuteStage(store),
		new InsertParseStage(),
		new InsertExecuteStage(store),
		new SelectParseStage(),
		new TableScanStage(store),
		new FilterStage(),
		new OrderStage(),
		new ProjectStage(),
		new DistinctStage(),
		new LimitStage(),
		new ResultSetStage(),
		new UpdateParseStage(),
		new UpdateExecuteStage(store),
		new DeleteParseStage(),
		new DeleteExecuteStage(store),
		new PersistParseStage(),
		new PersistExecuteStage(store, storage),
		new ResultStage()
	];
}
