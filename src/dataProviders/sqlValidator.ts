import { getLogger } from '../logger';

/**
 * Comparison operators accepted by `where` and `having`.
 */
export const COMPARISON_OPERATORS = ['=', '!=', '<>', '<', '<=', '>', '>=', 'LIKE', 'NOT LIKE'] as const;

export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];

/** Operator as callers may spell it; `like` and `not like` are accepted. */
export type ComparisonOperatorInput = ComparisonOperator | Lowercase<ComparisonOperator>;

/**
 * Operators accepted in a JOIN ... ON clause.
 */
export const JOIN_OPERATORS = ['=', '!=', '<>', '<', '<=', '>', '>='] as const;

export type JoinOperator = typeof JOIN_OPERATORS[number];

export const SORT_DIRECTIONS = ['ASC', 'DESC'] as const;

export type SortDirection = typeof SORT_DIRECTIONS[number];

export type SortDirectionInput = SortDirection | Lowercase<SortDirection>;

/**
 * Validates the SQL keywords and literals the query builder concatenates into statements.
 * Column and table names are not checked; only values are bound.
 */
export class SQLValidator
{
	private static readonly logger = getLogger('SQLValidator');

	/**
	 * Validate a WHERE/HAVING comparison operator
	 * @param operator Operator to validate (case-insensitive for LIKE forms)
	 * @returns The operator in canonical uppercase form
	 * @throws Error if the operator is not allowed
	 */
	static validateOperator(operator: string): ComparisonOperator
	{
		const normalized = operator.trim().toUpperCase();
		const match = COMPARISON_OPERATORS.find(op => op === normalized);
		if (!match)
		{
			this.logger.error('Invalid comparison operator detected', { operator, allowed: COMPARISON_OPERATORS });
			throw new Error(`Invalid operator: ${operator}`);
		}
		return match;
	}

	/**
	 * Validate a JOIN ... ON operator
	 */
	static validateJoinOperator(operator: string): JoinOperator
	{
		const match = JOIN_OPERATORS.find(op => op === operator.trim());
		if (!match)
		{
			this.logger.error('Invalid JOIN operator detected', { operator, allowed: JOIN_OPERATORS });
			throw new Error(`Invalid JOIN operator: ${operator}`);
		}
		return match;
	}

	/**
	 * Validate ORDER BY direction
	 * @param direction Sort direction
	 * @returns Validated direction (uppercase)
	 */
	static validateDirection(direction: string): SortDirection
	{
		const upperDirection = direction.toUpperCase();
		const match = SORT_DIRECTIONS.find(d => d === upperDirection);
		if (!match)
		{
			this.logger.error('Invalid ORDER BY direction detected', { direction, validDirections: SORT_DIRECTIONS });
			throw new Error(`Invalid ORDER BY direction: ${direction}`);
		}
		return match;
	}

	/**
	 * Validate a LIMIT or OFFSET literal.
	 * @param value Row count
	 * @param clause Clause name used in the error message
	 * @returns The value, unchanged
	 * @throws Error unless value is a non-negative safe integer
	 */
	static validateRowCount(value: number, clause: 'LIMIT' | 'OFFSET'): number
	{
		if (!Number.isSafeInteger(value) || value < 0)
		{
			this.logger.error(`Invalid ${clause} value detected`, { value });
			throw new Error(`Invalid ${clause} value: ${value}`);
		}
		return value;
	}
}
