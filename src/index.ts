/**
 * @file Main entry point. Exports the query engine, the dispatch core and
 * its collaborators.
 */

export { QueryEngine } from './queryEngine';
export type { QueryEngineConfig, ResolvedConfig } from './config';
export { resolveConfig } from './config';
export type { ExecutionResult, StatementMiddleware } from './middleware';
export { runMiddlewares } from './middleware';
export { createDefaultPipeline } from './pipeline';

export { Dispatcher, DEFAULT_MAX_ITERATIONS } from './dispatcher';
export type { DispatcherOptions, DispatchReport } from './dispatcher';
export { Stage } from './stage';
export type { PipelineStage, StageContext } from './stage';
export { WorkUnit, RowSetPhase, describePayload, failure, isPayloadOf, success } from './workUnit';
export type {
	Payload, PayloadKind, PayloadOf, RowSet, TerminalPayload, TransformRecord, UnitTrace
} from './workUnit';

export { parsePredicate } from './predicate/parser';
export { tokenizeClause } from './predicate/tokenizer';
export type { ClauseToken } from './predicate/tokenizer';
export { evaluatePredicate, likeToRegExp, valuesEqual } from './predicate/evaluator';
export { describePredicate, predicateColumns } from './predicate/types';
export type {
	Combinator, ComparisonOperator, PredicateBranch, PredicateLeaf, PredicateTree
} from './predicate/types';

export type * from './statements/statementSpec';
export { formatResultSet } from './stages/relational';

export { MemoryRowStore } from './storage/rowStore';
export type { Collection, RowPredicate, RowStore } from './storage/rowStore';
export { COLUMN_TYPES, TableSchema, defineColumn } from './storage/schema';
export type { ColumnDefinition, ColumnType } from './storage/schema';
export { JsonStorage, FILE_EXTENSION, FORMAT_VERSION, resolveDatabasePath } from './storage/jsonStorage';
export type { DatabaseFile, PersistenceEngine } from './storage/jsonStorage';

export { compareValues, formatValue, parseLiteral, parseNumber } from './values';
export type { Row, SqlValue } from './values';

export {
	IterationLimitError, QueryEngineError, QuerySyntaxError, SemanticError, StorageError
} from './errors';
export type { ErrorCategory } from './errors';
export { Logger, LogLevel, globalLogger, getLogger } from './logger';
export type { ContextLogger, LogEntry, LoggerConfig } from './logger';
