/**
 * @file Public entry point: the MySQL connection provider, the fluent query builder,
 * and the types, errors, middleware and logging they share.
 */
export { MySQLProvider } from './dataProviders/MySQLProvider';
export type { MySQLProviderOptions, ConnectionPoolConfig } from './dataProviders/MySQLProvider';
export { SQLValidator, COMPARISON_OPERATORS, JOIN_OPERATORS, SORT_DIRECTIONS } from './dataProviders/sqlValidator';
export type {
	ComparisonOperator,
	ComparisonOperatorInput,
	JoinOperator,
	SortDirection,
	SortDirectionInput,
} from './dataProviders/sqlValidator';
export { QueryBuilder } from './queryBuilder';
export type { ConnectionHandle } from './connectionHandle';
export type { SqlValue, Row, PreparedStatement, ExecutionResult } from './preparedStatement';
export { DatabaseError, ConnectionError, QueryError } from './errors';
export { runMiddlewares } from './middleware';
export type { StatementMiddleware } from './middleware';
export { Logger, LogLevel, globalLogger, getLogger } from './logger';
export type { LoggerConfig, LogEntry, ContextLogger } from './logger';
