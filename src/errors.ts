import type { SqlValue } from './preparedStatement';

/**
 * Base class for every error raised while talking to the database.
 */
export class DatabaseError extends Error
{
	constructor(message: string, public code?: string, public override cause?: Error)
	{
		super(message);
		this.name = 'DatabaseError';
		Error.captureStackTrace(this, this.constructor);
	}
}

/**
 * Raised when the initial connection cannot be established.
 */
export class ConnectionError extends DatabaseError
{
	constructor(message: string, cause?: Error)
	{
		super(message, 'CONNECTION_ERROR', cause);
		this.name = 'ConnectionError';
	}
}

/**
 * Raised when preparing or executing a statement fails.
 */
export class QueryError extends DatabaseError
{
	constructor(
		message: string,
		public sql?: string,
		public params?: SqlValue[],
		cause?: Error,
	)
	{
		super(message, 'QUERY_ERROR', cause);
		this.name = 'QueryError';
	}
}

/**
 * Extracts the driver's diagnostic text from whatever was thrown.
 */
export function errorMessage(err: unknown): string
{
	return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes a thrown value into an Error suitable for `cause`.
 */
export function toError(err: unknown): Error
{
	return err instanceof Error ? err : new Error(String(err));
}
