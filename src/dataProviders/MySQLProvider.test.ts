import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MySQLProvider, type MySQLProviderOptions } from './MySQLProvider';
import { ConnectionError, QueryError } from '../errors';
import type { StatementMiddleware } from '../middleware';
import { QueryBuilder } from '../queryBuilder';

const mocks = vi.hoisted(() => ({
	createConnection: vi.fn(),
	createPool: vi.fn(),
}));

vi.mock('mysql2/promise', () => ({
	default: {
		createConnection: mocks.createConnection,
		createPool: mocks.createPool,
	},
}));

function fakeConnection()
{
	return {
		execute: vi.fn().mockResolvedValue([[], []]),
		end: vi.fn().mockResolvedValue(undefined),
	};
}

function fakePool()
{
	return {
		...fakeConnection(),
		getConnection: vi.fn(),
	};
}

describe('MySQLProvider - Unit Tests', () =>
{
	let options: MySQLProviderOptions;
	let connection: ReturnType<typeof fakeConnection>;

	beforeEach(() =>
	{
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
		vi.spyOn(console, 'debug').mockImplementation(() => {});

		options = {
			host: 'localhost',
			database: 'shop',
			user: 'shop',
			password: 'test-secret',
		};
		connection = fakeConnection();
		mocks.createConnection.mockReset().mockResolvedValue(connection);
		mocks.createPool.mockReset();
	});

	afterEach(() =>
	{
		vi.restoreAllMocks();
	});

	describe('connect', () =>
	{
		it('should open a single connection with prepared-statement defaults', async () =>
		{
			const db = await MySQLProvider.connect(options);

			expect(db).toBeInstanceOf(MySQLProvider);
			expect(db.isConnected()).toBe(true);
			expect(mocks.createPool).not.toHaveBeenCalled();
			expect(mocks.createConnection).toHaveBeenCalledWith({
				charset: 'utf8mb4',
				host: 'localhost',
				database: 'shop',
				user: 'shop',
				password: 'test-secret',
				rowsAsArray: false,
				namedPlaceholders: false,
			});
		});

		it('should keep an explicit charset and warn when it is not utf8mb4', async () =>
		{
			await MySQLProvider.connect({ ...options, charset: 'latin1' });

			expect(mocks.createConnection).toHaveBeenCalledWith(expect.objectContaining({ charset: 'latin1' }));
			expect(console.warn).toHaveBeenCalledWith(
				expect.stringContaining('[MySQLProvider] MySQL charset is not utf8mb4.')
			);
		});

		it('should not let callers turn on named placeholders', async () =>
		{
			await MySQLProvider.connect({ ...options, namedPlaceholders: true, rowsAsArray: true });

			expect(mocks.createConnection).toHaveBeenCalledWith(expect.objectContaining({
				rowsAsArray: false,
				namedPlaceholders: false,
			}));
		});

		it('should raise ConnectionError with the driver message', async () =>
		{
			const driverError = new Error("Access denied for user 'shop'@'localhost'");
			mocks.createConnection.mockRejectedValue(driverError);

			const error = await MySQLProvider.connect(options).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(ConnectionError);
			expect(error).toMatchObject({
				message: "Database connection failed: Access denied for user 'shop'@'localhost'",
				code: 'CONNECTION_ERROR',
				cause: driverError,
			});
		});
	});

	describe('Connection pooling', () =>
	{
		it('should create a pool with default limits', async () =>
		{
			const pool = fakePool();
			mocks.createPool.mockReturnValue(pool);

			const db = await MySQLProvider.connect({ ...options, pool: { usePool: true } });
			await db.execute('SELECT 1', []);

			expect(mocks.createConnection).not.toHaveBeenCalled();
			expect(mocks.createPool).toHaveBeenCalledWith(expect.objectContaining({
				host: 'localhost',
				connectionLimit: 10,
				queueLimit: 0,
			}));
			expect(pool.execute).toHaveBeenCalledWith('SELECT 1', []);
		});

		it('should ping a pooled connection when preConnect is set', async () =>
		{
			const pooled = { ping: vi.fn().mockResolvedValue(undefined), release: vi.fn() };
			const pool = fakePool();
			pool.getConnection.mockResolvedValue(pooled);
			mocks.createPool.mockReturnValue(pool);

			await MySQLProvider.connect({ ...options, pool: { usePool: true, preConnect: true, connectionLimit: 3 } });

			expect(mocks.createPool).toHaveBeenCalledWith(expect.objectContaining({ connectionLimit: 3 }));
			expect(pooled.ping).toHaveBeenCalledOnce();
			expect(pooled.release).toHaveBeenCalledOnce();
		});

		it('should end the pool and raise ConnectionError when the ping fails', async () =>
		{
			const pingError = new Error('connect ECONNREFUSED 127.0.0.1:3306');
			const pooled = { ping: vi.fn().mockRejectedValue(pingError), release: vi.fn() };
			const pool = fakePool();
			pool.getConnection.mockResolvedValue(pooled);
			mocks.createPool.mockReturnValue(pool);

			await expect(MySQLProvider.connect({ ...options, pool: { usePool: true, preConnect: true } }))
				.rejects.toMatchObject({
					name: 'ConnectionError',
					code: 'CONNECTION_ERROR',
					message: 'Database connection failed: connect ECONNREFUSED 127.0.0.1:3306',
					cause: pingError
				});
			expect(pool.end).toHaveBeenCalledOnce();
		});
	});

	describe('execute', () =>
	{
		it('should return rows for a result set', async () =>
		{
			connection.execute.mockResolvedValue([[{ id: 1, name: 'Ann' }], []]);
			const db = await MySQLProvider.connect(options);

			const result = await db.execute('SELECT id, name FROM users WHERE id = ?', [1]);

			expect(connection.execute).toHaveBeenCalledWith('SELECT id, name FROM users WHERE id = ?', [1]);
			expect(result).toEqual({ rows: [{ id: 1, name: 'Ann' }], affectedRows: 0, insertId: 0 });
		});

		it('should return write counters for a result header', async () =>
		{
			connection.execute.mockResolvedValue([{ affectedRows: 1, insertId: 42 }, undefined]);
			const db = await MySQLProvider.connect(options);

			const result = await db.execute('INSERT INTO users (name) VALUES (?)', ['Ann']);

			expect(result).toEqual({ rows: [], affectedRows: 1, insertId: 42 });
		});

		it('should normalize column values', async () =>
		{
			const created = new Date('2026-03-01T10:00:00Z');
			const avatar = Buffer.from([1, 2, 3]);
			connection.execute.mockResolvedValue([[{ id: 1, meta: { plan: 'pro' }, created, avatar, note: undefined }], []]);
			const db = await MySQLProvider.connect(options);

			const { rows } = await db.execute('SELECT * FROM users');

			expect(rows).toEqual([{ id: 1, meta: '{"plan":"pro"}', created, avatar, note: null }]);
		});

		it('should raise QueryError carrying the driver message and statement', async () =>
		{
			const driverError = new Error("Duplicate entry '1' for key 'PRIMARY'");
			connection.execute.mockRejectedValue(driverError);
			const db = await MySQLProvider.connect(options);

			const error = await db.execute('INSERT INTO users (id) VALUES (?)', [1]).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(QueryError);
			expect(error).toMatchObject({
				message: "Query execution failed: Duplicate entry '1' for key 'PRIMARY'",
				sql: 'INSERT INTO users (id) VALUES (?)',
				params: [1],
				cause: driverError,
			});
		});

		it('should run statements through the configured middlewares', async () =>
		{
			const tagged: StatementMiddleware = async (statement, next) =>
				next({ sql: `/* app */ ${statement.sql}`, params: statement.params });
			const db = await MySQLProvider.connect({ ...options, middlewares: [tagged] });

			await db.execute('SELECT 1', []);

			expect(connection.execute).toHaveBeenCalledWith('/* app */ SELECT 1', []);
			expect(mocks.createConnection).toHaveBeenCalledWith(expect.not.objectContaining({ middlewares: [tagged] }));
		});
	});

	describe('table', () =>
	{
		it('should return a builder that executes through the provider', async () =>
		{
			connection.execute.mockResolvedValue([[{ count: 3 }], []]);
			const db = await MySQLProvider.connect(options);

			const builder = db.table('users');
			const total = await builder.where('active', true).count();

			expect(builder).toBeInstanceOf(QueryBuilder);
			expect(total).toBe(3);
			expect(connection.execute).toHaveBeenCalledWith('SELECT COUNT(*) AS count FROM users WHERE active = ?', [true]);
		});
	});

	describe('disconnect', () =>
	{
		it('should end the connection once', async () =>
		{
			const db = await MySQLProvider.connect(options);

			await db.disconnect();
			await db.disconnect();

			expect(connection.end).toHaveBeenCalledOnce();
			expect(db.isConnected()).toBe(false);
		});

		it('should reject statements after disconnecting', async () =>
		{
			const db = await MySQLProvider.connect(options);
			await db.disconnect();

			await expect(db.execute('SELECT 1', [])).rejects.toThrow('Query execution failed: not connected');
			expect(connection.execute).not.toHaveBeenCalled();
		});
	});
});
