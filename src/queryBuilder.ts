import type { ConnectionHandle } from './connectionHandle';
import { DatabaseError, QueryError, errorMessage, toError } from './errors';
import { getLogger } from './logger';
import type { ExecutionResult, PreparedStatement, Row, SqlValue } from './preparedStatement';
import {
	SQLValidator,
	type ComparisonOperator,
	type ComparisonOperatorInput,
	type JoinOperator,
	type SortDirection,
	type SortDirectionInput,
} from './dataProviders/sqlValidator';

/** Largest row count MySQL accepts in LIMIT (2^64 - 1) */
const MAX_ROW_COUNT = '18446744073709551615';

interface ComparePredicate
{
	kind: 'compare';
	column: string;
	operator: ComparisonOperator;
	value: SqlValue;
}

interface InPredicate
{
	kind: 'in';
	column: string;
	negated: boolean;
	values: SqlValue[];
}

interface NullPredicate
{
	kind: 'null';
	column: string;
	negated: boolean;
}

type Predicate = ComparePredicate | InPredicate | NullPredicate;

interface JoinClause
{
	type: 'INNER' | 'LEFT';
	table: string;
	foreignColumn: string;
	operator: JoinOperator;
	/** Table name the builder targeted when the join was added */
	localTable: string;
	localColumn: string;
}

interface OrderByClause
{
	column: string;
	direction: SortDirection;
}

/**
 * Fluent SELECT/INSERT/UPDATE/DELETE builder bound to one table and one connection handle.
 *
 * Clause methods record structured state and return the builder; terminal methods
 * (`execute`, `insert`, `update`, `delete`, `count`, `exists`) compile that state into a
 * statement with positional `?` placeholders, run it, and reset the builder on success.
 * Clauses are always emitted in SQL order, whatever order they were added in.
 *
 * A builder holds mutable state: await each terminal call before starting the next one,
 * and give every concurrent flow its own builder. Builders may share a handle.
 *
 * @example
 * ```typescript
 * const rows = await new QueryBuilder(db, 'users')
 *   .select(['id', 'name'])
 *   .where('status', 'active')
 *   .where('age', 18, '>=')
 *   .orderBy('name')
 *   .limit(10)
 *   .execute();
 * ```
 */
export class QueryBuilder
{
	private static readonly logger = getLogger('QueryBuilder');

	private readonly handle: ConnectionHandle;
	private targetTable: string;

	private columns?: string[];
	private joins: JoinClause[] = [];
	private predicates: Predicate[] = [];
	private groupColumns: string[] = [];
	private havingPredicates: ComparePredicate[] = [];
	private sortKeys: OrderByClause[] = [];
	private limitCount?: number;
	private offsetCount?: number;

	/**
	 * @param handle Connection the builder executes through.
	 * @param table Table every statement targets until `from()` changes it.
	 */
	constructor(handle: ConnectionHandle, table: string)
	{
		this.handle = handle;
		this.targetTable = table;
	}

	/**
	 * Starts a new SELECT, discarding every clause and binding added so far.
	 * @param columns Column expressions; an empty list selects `*`.
	 */
	select(columns: string[] = ['*']): this
	{
		this.reset();
		this.columns = columns.length > 0 ? [...columns] : ['*'];
		return this;
	}

	/**
	 * Switches the target table.
	 */
	from(table: string): this
	{
		this.targetTable = table;
		return this;
	}

	/**
	 * Adds `column operator ?` to the WHERE clause, AND-ed with earlier predicates.
	 */
	where(column: string, value: SqlValue, operator: ComparisonOperatorInput = '='): this
	{
		const validated = SQLValidator.validateOperator(operator);
		this.predicates.push({ kind: 'compare', column, operator: validated, value });
		return this;
	}

	/**
	 * Adds `column IN (?, ...)`. An empty list matches no rows.
	 */
	whereIn(column: string, values: SqlValue[]): this
	{
		this.predicates.push({ kind: 'in', column, negated: false, values: [...values] });
		return this;
	}

	/**
	 * Adds `column NOT IN (?, ...)`. An empty list matches every row.
	 */
	whereNotIn(column: string, values: SqlValue[]): this
	{
		this.predicates.push({ kind: 'in', column, negated: true, values: [...values] });
		return this;
	}

	whereNull(column: string): this
	{
		this.predicates.push({ kind: 'null', column, negated: false });
		return this;
	}

	whereNotNull(column: string): this
	{
		this.predicates.push({ kind: 'null', column, negated: true });
		return this;
	}

	/**
	 * Adds `INNER JOIN table ON <target>.<localColumn> operator table.foreignColumn`.
	 * @param localColumn Defaults to `<target>_id`.
	 */
	join(table: string, foreignColumn: string, operator: JoinOperator = '=', localColumn?: string): this
	{
		return this.addJoin('INNER', table, foreignColumn, operator, localColumn);
	}

	/**
	 * Same as `join`, as a LEFT JOIN.
	 */
	leftJoin(table: string, foreignColumn: string, operator: JoinOperator = '=', localColumn?: string): this
	{
		return this.addJoin('LEFT', table, foreignColumn, operator, localColumn);
	}

	orderBy(column: string, direction: SortDirectionInput = 'ASC'): this
	{
		this.sortKeys.push({ column, direction: SQLValidator.validateDirection(direction) });
		return this;
	}

	groupBy(...columns: string[]): this
	{
		this.groupColumns.push(...columns);
		return this;
	}

	/**
	 * Adds `column operator ?` to the HAVING clause, AND-ed with earlier conditions.
	 */
	having(column: string, value: SqlValue, operator: ComparisonOperatorInput = '='): this
	{
		const validated = SQLValidator.validateOperator(operator);
		this.havingPredicates.push({ kind: 'compare', column, operator: validated, value });
		return this;
	}

	limit(limit: number): this
	{
		this.limitCount = SQLValidator.validateRowCount(limit, 'LIMIT');
		return this;
	}

	offset(offset: number): this
	{
		this.offsetCount = SQLValidator.validateRowCount(offset, 'OFFSET');
		return this;
	}

	/**
	 * Runs the accumulated SELECT (`SELECT *` when `select()` was never called).
	 * @returns Result rows keyed by column name.
	 * @throws QueryError if execution fails; the builder keeps its state.
	 */
	async execute(): Promise<Row[]>
	{
		const result = await this.run(this.compileSelect());
		this.reset();
		return result.rows;
	}

	/**
	 * Inserts one row. Accumulated clauses are ignored and then cleared.
	 * @param data Column names mapped to values, bound in key order.
	 */
	async insert(data: Record<string, SqlValue>): Promise<boolean>
	{
		const entries = Object.entries(data);
		if (entries.length === 0)
		{
			throw new Error('INSERT requires at least one column');
		}

		const columns = entries.map(([column]) => column);
		await this.run({
			sql: `INSERT INTO ${this.targetTable} (${columns.join(', ')}) VALUES (${placeholders(columns.length)})`,
			params: entries.map(([, value]) => value),
		});
		this.reset();
		return true;
	}

	/**
	 * Updates the rows matched by the accumulated WHERE clause.
	 * Without a WHERE clause every row in the table is updated.
	 */
	async update(data: Record<string, SqlValue>): Promise<boolean>
	{
		const entries = Object.entries(data);
		if (entries.length === 0)
		{
			throw new Error('UPDATE requires at least one column');
		}

		this.warnIfUnfiltered('UPDATE');
		const params: SqlValue[] = entries.map(([, value]) => value);
		const setClause = entries.map(([column]) => `${column} = ?`).join(', ');
		const sql = `UPDATE ${this.targetTable} SET ${setClause}${this.compileWhere(params)}`;

		await this.run({ sql, params });
		this.reset();
		return true;
	}

	/**
	 * Deletes the rows matched by the accumulated WHERE clause.
	 * Without a WHERE clause every row in the table is deleted.
	 */
	async delete(): Promise<boolean>
	{
		this.warnIfUnfiltered('DELETE');
		const params: SqlValue[] = [];
		const sql = `DELETE FROM ${this.targetTable}${this.compileWhere(params)}`;

		await this.run({ sql, params });
		this.reset();
		return true;
	}

	/**
	 * Counts the rows matched by the accumulated joins and WHERE clause.
	 * @returns The count, 0 when nothing matched.
	 */
	async count(column: string = '*'): Promise<number>
	{
		const params: SqlValue[] = [];
		const sql = `SELECT COUNT(${column}) AS count FROM ${this.targetTable}${this.compileJoins()}${this.compileWhere(params)}`;

		const result = await this.run({ sql, params });
		this.reset();
		return toCount(result.rows[0]?.count);
	}

	/**
	 * Checks whether at least one row matches the accumulated joins and WHERE clause.
	 */
	async exists(): Promise<boolean>
	{
		const params: SqlValue[] = [];
		const sql = `SELECT EXISTS(SELECT 1 FROM ${this.targetTable}${this.compileJoins()}${this.compileWhere(params)}) AS result`;

		const result = await this.run({ sql, params });
		this.reset();
		return isTruthyFlag(result.rows[0]?.result);
	}

	/**
	 * Executes caller-supplied SQL verbatim. Builder state is neither read nor reset.
	 * @param sql SQL text; only `params` are bound, the text itself is trusted.
	 */
	async executeRaw(sql: string, params: SqlValue[] = []): Promise<Row[]>
	{
		const result = await this.run({ sql, params: [...params] });
		return result.rows;
	}

	/**
	 * The SQL `execute()` would send, or an empty string when nothing has been accumulated.
	 */
	getRawQuery(): string
	{
		return this.isIdle() ? '' : this.compileSelect().sql;
	}

	/**
	 * The SELECT `execute()` would send, with its bound parameters.
	 */
	toStatement(): PreparedStatement
	{
		return this.compileSelect();
	}

	/**
	 * Clears every clause and binding; the target table and handle are kept.
	 */
	reset(): this
	{
		this.columns = undefined;
		this.joins = [];
		this.predicates = [];
		this.groupColumns = [];
		this.havingPredicates = [];
		this.sortKeys = [];
		this.limitCount = undefined;
		this.offsetCount = undefined;
		return this;
	}

	private addJoin(
		type: JoinClause['type'],
		table: string,
		foreignColumn: string,
		operator: JoinOperator,
		localColumn: string | undefined
	): this
	{
		this.joins.push({
			type,
			table,
			foreignColumn,
			operator: SQLValidator.validateJoinOperator(operator),
			localTable: this.targetTable,
			localColumn: localColumn ?? `${this.targetTable}_id`,
		});
		return this;
	}

	private isIdle(): boolean
	{
		return this.columns === undefined
			&& this.joins.length === 0
			&& this.predicates.length === 0
			&& this.groupColumns.length === 0
			&& this.havingPredicates.length === 0
			&& this.sortKeys.length === 0
			&& this.limitCount === undefined
			&& this.offsetCount === undefined;
	}

	private compileSelect(): PreparedStatement
	{
		const params: SqlValue[] = [];
		let sql = `SELECT ${(this.columns ?? ['*']).join(', ')} FROM ${this.targetTable}`;

		sql += this.compileJoins();
		sql += this.compileWhere(params);

		if (this.groupColumns.length > 0)
		{
			sql += ` GROUP BY ${this.groupColumns.join(', ')}`;
		}
		if (this.havingPredicates.length > 0)
		{
			sql += ' HAVING ' + this.havingPredicates.map(p => compilePredicate(p, params)).join(' AND ');
		}
		if (this.sortKeys.length > 0)
		{
			sql += ' ORDER BY ' + this.sortKeys.map(o => `${o.column} ${o.direction}`).join(', ');
		}
		// LIMIT/OFFSET are embedded as literals, never bound.
		// MySQL has no bare OFFSET, so an offset alone gets the largest LIMIT.
		if (this.limitCount !== undefined)
		{
			sql += ` LIMIT ${this.limitCount}`;
		}
		else if (this.offsetCount !== undefined)
		{
			sql += ` LIMIT ${MAX_ROW_COUNT}`;
		}
		if (this.offsetCount !== undefined)
		{
			sql += ` OFFSET ${this.offsetCount}`;
		}

		return { sql, params };
	}

	private compileJoins(): string
	{
		return this.joins
			.map(j => ` ${j.type} JOIN ${j.table} ON ${j.localTable}.${j.localColumn} ${j.operator} ${j.table}.${j.foreignColumn}`)
			.join('');
	}

	/**
	 * Renders the WHERE clause, appending its values to `params`.
	 */
	private compileWhere(params: SqlValue[]): string
	{
		return this.predicates
			.map((p, i) => (i === 0 ? ' WHERE ' : ' AND ') + compilePredicate(p, params))
			.join('');
	}

	private warnIfUnfiltered(verb: 'UPDATE' | 'DELETE'): void
	{
		if (this.predicates.length === 0)
		{
			QueryBuilder.logger.warn(`${verb} without WHERE affects every row`, { table: this.targetTable });
		}
	}

	private async run(statement: PreparedStatement): Promise<ExecutionResult>
	{
		QueryBuilder.logger.debug('Executing statement', { sql: statement.sql, paramCount: statement.params.length });

		try
		{
			return await this.handle.execute(statement.sql, statement.params);
		}
		catch (error)
		{
			if (error instanceof DatabaseError) throw error;

			throw new QueryError(
				`Query execution failed: ${errorMessage(error)}`,
				statement.sql,
				statement.params,
				toError(error)
			);
		}
	}
}

function placeholders(count: number): string
{
	return Array.from({ length: count }, () => '?').join(', ');
}

function compilePredicate(predicate: Predicate, params: SqlValue[]): string
{
	switch (predicate.kind)
	{
		case 'compare':
			params.push(predicate.value);
			return `${predicate.column} ${predicate.operator} ?`;

		case 'in':
			if (predicate.values.length === 0)
			{
				return predicate.negated ? '1 = 1' : '1 = 0';
			}
			params.push(...predicate.values);
			return `${predicate.column} ${predicate.negated ? 'NOT IN' : 'IN'} (${placeholders(predicate.values.length)})`;

		case 'null':
			return `${predicate.column} ${predicate.negated ? 'IS NOT NULL' : 'IS NULL'}`;
	}
}

function toCount(value: SqlValue | undefined): number
{
	switch (typeof value)
	{
		case 'number':
			return Math.trunc(value);
		case 'bigint':
			return Number(value);
		case 'string':
		{
			const parsed = Number.parseInt(value, 10);
			return Number.isNaN(parsed) ? 0 : parsed;
		}
		default:
			return 0;
	}
}

function isTruthyFlag(value: SqlValue | undefined): boolean
{
	switch (typeof value)
	{
		case 'number':
			return value !== 0;
		case 'bigint':
			return value !== 0n;
		case 'string':
			return value !== '' && value !== '0';
		case 'boolean':
			return value;
		default:
			return false;
	}
}
