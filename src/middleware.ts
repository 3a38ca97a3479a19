import type { ExecutionResult, PreparedStatement } from './preparedStatement';

/**
 * Middlewares wrap statement execution: they may rewrite the statement before calling `next`,
 * inspect the result afterwards, or answer without calling `next` at all.
 * @param statement The statement about to be executed.
 * @param next A function that invokes the next middleware in the chain.
 * @returns A promise that resolves with the execution result.
 */
export type StatementMiddleware = (
	statement: PreparedStatement,
	next: (statement: PreparedStatement) => Promise<ExecutionResult>
) => Promise<ExecutionResult>;

/**
 * Composes and executes a chain of middleware functions for a given statement.
 * @param middlewares An array of middleware functions to run.
 * @param statement The initial statement.
 * @param final The function that actually executes the statement.
 * @returns A promise that resolves with the final execution result.
 */
export async function runMiddlewares(
	middlewares: StatementMiddleware[],
	statement: PreparedStatement,
	final: (statement: PreparedStatement) => Promise<ExecutionResult>
): Promise<ExecutionResult>
{
	if (middlewares.length === 0) { return final(statement); }

	let idx = -1;
	async function dispatch(i: number, s: PreparedStatement): Promise<ExecutionResult>
	{
		if (i <= idx) throw new Error('middleware: next() called multiple times');
		idx = i;
		const mw = middlewares[i];
		if (!mw)
			return final(s);

		return mw(s, (nextStatement) => dispatch(i + 1, nextStatement));
	}

	return dispatch(0, statement);
}
