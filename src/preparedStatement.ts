/**
 * PreparedStatement - SQL text paired with its positional parameters
 *
 * Every statement this library sends uses `?` placeholders only; the
 * parameter list holds the bound values in placeholder order.
 *
 * @module preparedStatement
 */

/**
 * A value that can be bound to a placeholder or read back from a row.
 */
export type SqlValue = string | number | bigint | boolean | Date | Buffer | null;

/**
 * A result row keyed by column name.
 */
export type Row = Record<string, SqlValue>;

/**
 * SQL text with its bound parameters.
 */
export interface PreparedStatement
{
	/** SQL with `?` placeholders (e.g., "SELECT * FROM users WHERE id = ?") */
	sql: string;

	/** Parameter values in placeholder order */
	params: SqlValue[];
}

/**
 * Outcome of executing a statement.
 */
export interface ExecutionResult
{
	/** Rows of the result set (empty for INSERT/UPDATE/DELETE) */
	rows: Row[];

	/** Number of rows changed by INSERT/UPDATE/DELETE */
	affectedRows: number;

	/** Auto-increment id generated by an INSERT, 0 otherwise */
	insertId: number;
}

/**
 * Converts a value read from the driver into a SqlValue.
 * Parsed JSON columns come back as their JSON text.
 */
export function toSqlValue(value: unknown): SqlValue
{
	if (value === null || value === undefined) return null;

	switch (typeof value)
	{
		case 'string':
		case 'number':
		case 'bigint':
		case 'boolean':
			return value;
	}

	if (value instanceof Date || Buffer.isBuffer(value))
	{
		return value;
	}

	return JSON.stringify(value);
}

/**
 * Converts a driver row object into a Row.
 */
export function toRow(packet: unknown): Row
{
	const row: Row = {};
	if (typeof packet !== 'object' || packet === null) return row;

	for (const [column, value] of Object.entries(packet))
	{
		row[column] = toSqlValue(value);
	}
	return row;
}
