import type { ExecutionResult, SqlValue } from './preparedStatement';

/**
 * An open database session that query builders execute statements through.
 * Any number of builders may share one handle.
 */
export interface ConnectionHandle
{
	/**
	 * Prepares and executes a statement with positional parameters.
	 * @param sql SQL text with `?` placeholders.
	 * @param params Values bound to the placeholders, in order.
	 * @returns Rows and write counters reported by the driver.
	 */
	execute(sql: string, params: SqlValue[]): Promise<ExecutionResult>;
}
