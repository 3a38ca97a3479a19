import mysql, { type Connection, type ConnectionOptions, type Pool, type PoolOptions } from 'mysql2/promise';
import type { ConnectionHandle } from '../connectionHandle';
import { ConnectionError, QueryError, errorMessage, toError } from '../errors';
import { getLogger } from '../logger';
import { type StatementMiddleware, runMiddlewares } from '../middleware';
import { type ExecutionResult, type PreparedStatement, type SqlValue, toRow } from '../preparedStatement';
import { QueryBuilder } from '../queryBuilder';

/**
 * Connection pool configuration options.
 */
export interface ConnectionPoolConfig
{
	/** Whether to use a connection pool instead of a single connection (default: false) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Maximum number of connection requests in the queue (default: 0, no limit) */
	queueLimit?: number;
	/** Whether to check out and ping a connection before `connect()` resolves (default: false) */
	preConnect?: boolean;
}

/**
 * MySQL connection options, extending `ConnectionOptions` from `mysql2/promise`.
 */
export interface MySQLProviderOptions extends ConnectionOptions
{
	host: string;
	database: string;
	user: string;
	password: string;
	/** Connection pool configuration */
	pool?: ConnectionPoolConfig;
	/** Interceptors run around every executed statement */
	middlewares?: StatementMiddleware[];
}

/**
 * Opens and owns the MySQL session that query builders execute through.
 *
 * @example
 * ```typescript
 * const db = await MySQLProvider.connect({
 *   host: 'localhost',
 *   database: 'shop',
 *   user: 'shop',
 *   password: 'test-secret',
 * });
 * const rows = await db.table('orders').select(['id', 'total']).where('status', 'paid').execute();
 * ```
 */
export class MySQLProvider implements ConnectionHandle
{
	private static readonly logger = getLogger('MySQLProvider');

	/**
	 * The single connection or pool statements are sent to; undefined once disconnected.
	 */
	private target?: Connection | Pool;

	private readonly middlewares: StatementMiddleware[];

	private constructor(target: Connection | Pool, middlewares: StatementMiddleware[])
	{
		this.target = target;
		this.middlewares = middlewares;
	}

	/**
	 * Connects to MySQL with server-side prepared statements and object rows.
	 * @param options Credentials, driver options and pool configuration.
	 * @throws ConnectionError if the connection (or the pre-connect ping) fails.
	 */
	static async connect(options: MySQLProviderOptions): Promise<MySQLProvider>
	{
		const { pool: poolConfig = {}, middlewares = [], ...connectionOptions } = options;
		const driverOptions: ConnectionOptions = {
			charset: 'utf8mb4',
			...connectionOptions,
			rowsAsArray: false,
			namedPlaceholders: false,
		};
		const usePool = poolConfig.usePool === true;

		this.logger.debug('Connecting to MySQL database', {
			host: driverOptions.host,
			database: driverOptions.database,
			usePool,
			charset: driverOptions.charset
		});

		if (driverOptions.charset && driverOptions.charset.toLowerCase() !== 'utf8mb4')
		{
			this.logger.warn('MySQL charset is not utf8mb4. Emoji and some Unicode characters may not be stored correctly.', {
				charset: driverOptions.charset
			});
		}

		try
		{
			if (usePool)
			{
				const poolOptions: PoolOptions = {
					...driverOptions,
					connectionLimit: poolConfig.connectionLimit ?? 10,
					queueLimit: poolConfig.queueLimit ?? 0,
				};
				const pool = mysql.createPool(poolOptions);

				if (poolConfig.preConnect)
				{
					try
					{
						const testConnection = await pool.getConnection();
						await testConnection.ping();
						testConnection.release();
					}
					catch (error)
					{
						await pool.end();
						throw error;
					}
				}

				this.logger.info('MySQL connection pool created', { connectionLimit: poolOptions.connectionLimit });
				return new MySQLProvider(pool, middlewares);
			}

			const connection = await mysql.createConnection(driverOptions);
			this.logger.info('MySQL connection established', { host: driverOptions.host, database: driverOptions.database });
			return new MySQLProvider(connection, middlewares);
		}
		catch (error)
		{
			const message = `Database connection failed: ${errorMessage(error)}`;
			this.logger.error(message, { host: driverOptions.host, database: driverOptions.database });
			throw new ConnectionError(message, toError(error));
		}
	}

	/**
	 * Returns a query builder for `table` that executes through this provider.
	 */
	table(table: string): QueryBuilder
	{
		return new QueryBuilder(this, table);
	}

	isConnected(): boolean
	{
		return this.target !== undefined;
	}

	/**
	 * Prepares and executes a statement, running it through the configured middlewares.
	 * @throws QueryError if the driver rejects the statement.
	 */
	async execute(sql: string, params: SqlValue[] = []): Promise<ExecutionResult>
	{
		return runMiddlewares(this.middlewares, { sql, params }, (statement) => this.send(statement));
	}

	/**
	 * Closes the connection or pool. Calling it again is a no-op.
	 */
	async disconnect(): Promise<void>
	{
		const target = this.target;
		if (!target) return;

		this.target = undefined;
		await target.end();
		MySQLProvider.logger.info('MySQL connection closed');
	}

	private async send(statement: PreparedStatement): Promise<ExecutionResult>
	{
		const { sql, params } = statement;
		if (!this.target)
		{
			throw new QueryError('Query execution failed: not connected', sql, params);
		}

		MySQLProvider.logger.debug('Executing SQL', { sql, paramCount: params.length });

		try
		{
			const [result] = await this.target.execute(sql, params);

			if (Array.isArray(result))
			{
				const packets: unknown[] = result;
				return { rows: packets.map(toRow), affectedRows: 0, insertId: 0 };
			}

			return {
				rows: [],
				affectedRows: 'affectedRows' in result && typeof result.affectedRows === 'number' ? result.affectedRows : 0,
				insertId: 'insertId' in result && typeof result.insertId === 'number' ? result.insertId : 0,
			};
		}
		catch (error)
		{
			const message = `Query execution failed: ${errorMessage(error)}`;
			MySQLProvider.logger.error(message, { sql });
			throw new QueryError(message, sql, params, toError(error));
		}
	}
}
