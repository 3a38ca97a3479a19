/**
 * Manual MySQL smoke test
 *
 * Runs the query builder against a live MySQL server. Not part of `npm test`.
 * Expects a scratch database reachable with the MYSQL_* environment variables
 * (defaults: localhost:3307, test_user / test_password, database test_db).
 *
 * 1. Connection
 * 2. Table setup and INSERT
 * 3. WHERE / IN / NULL checks
 * 4. JOIN, GROUP BY, HAVING
 * 5. UPDATE / DELETE / COUNT / EXISTS
 * 6. Error handling
 */

import { MySQLProvider, QueryError } from '../src/index';

const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    green: '\x1b[32m',
    red: '\x1b[31m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
};

function log(message: string, color: string = colors.reset) {
    console.log(`${color}${message}${colors.reset}`);
}

function section(title: string) {
    console.log('\n' + '='.repeat(60));
    log(title, colors.bright + colors.cyan);
    console.log('='.repeat(60));
}

function success(message: string) {
    log(`✓ ${message}`, colors.green);
}

function error(message: string) {
    log(`✗ ${message}`, colors.red);
}

function info(message: string) {
    log(`ℹ ${message}`, colors.blue);
}

async function runTests() {
    let db: MySQLProvider | null = null;

    try {
        section('1. Connect');

        db = await MySQLProvider.connect({
            host: process.env.MYSQL_HOST ?? 'localhost',
            port: Number(process.env.MYSQL_PORT ?? 3307),
            user: process.env.MYSQL_USER ?? 'test_user',
            password: process.env.MYSQL_PASSWORD ?? 'test_password',
            database: process.env.MYSQL_DATABASE ?? 'test_db',
        });
        success('Connected');

        section('2. Setup and INSERT');

        await db.execute('DROP TABLE IF EXISTS qb_orders', []);
        await db.execute('DROP TABLE IF EXISTS qb_users', []);
        await db.execute(
            'CREATE TABLE qb_users (id INT AUTO_INCREMENT PRIMARY KEY, name VARCHAR(64) NOT NULL, team VARCHAR(32), deleted_at DATETIME NULL)',
            []
        );
        await db.execute(
            'CREATE TABLE qb_orders (id INT AUTO_INCREMENT PRIMARY KEY, qb_users_id INT NOT NULL, total INT NOT NULL)',
            []
        );

        const users = db.table('qb_users');
        for (const [name, team] of [['Ann', 'red'], ['Bob', 'red'], ['Cid', 'blue'], ['Dee 😀', 'blue']]) {
            await users.insert({ name, team });
        }
        const orders = db.table('qb_orders');
        for (const [userId, total] of [[1, 30], [1, 70], [2, 15], [3, 120]]) {
            await orders.insert({ qb_users_id: userId, total });
        }
        success('Inserted 4 users and 4 orders');

        section('3. WHERE / IN / NULL');

        const red = await users.select(['id', 'name']).where('team', 'red').orderBy('name').execute();
        info(`Red team: ${red.map(r => r.name).join(', ')}`);

        const some = await users.select(['name']).whereIn('id', [2, 3]).execute();
        success(`whereIn returned ${some.length} rows`);

        const none = await users.select(['name']).whereIn('id', []).execute();
        success(`Empty whereIn returned ${none.length} rows`);

        const alive = await users.select(['name']).whereNull('deleted_at').execute();
        success(`whereNull returned ${alive.length} rows`);

        section('4. JOIN / GROUP BY / HAVING');

        const totals = await users
            .select(['qb_users.name', 'SUM(qb_orders.total) AS spent'])
            .join('qb_orders', 'qb_users_id', '=', 'id')
            .groupBy('qb_users.name')
            .having('SUM(qb_orders.total)', 50, '>')
            .orderBy('spent', 'DESC')
            .execute();
        info(`Big spenders: ${JSON.stringify(totals)}`);

        section('5. UPDATE / DELETE / COUNT / EXISTS');

        await users.where('name', 'Bob').update({ team: 'green' });
        success(`Green team size: ${await users.where('team', 'green').count()}`);

        await orders.where('total', 20, '<').delete();
        success(`Orders left: ${await orders.count()}`);

        success(`Anyone on purple? ${await users.where('team', 'purple').exists()}`);

        section('6. Error handling');

        try {
            await db.table('qb_missing').select().execute();
            error('Expected a QueryError');
        } catch (err) {
            if (err instanceof QueryError) {
                success(`QueryError raised: ${err.message}`);
            } else {
                throw err;
            }
        }

        await db.execute('DROP TABLE qb_orders', []);
        await db.execute('DROP TABLE qb_users', []);
        success('All checks completed');

    } catch (err) {
        error(`Test failed: ${err instanceof Error ? err.message : String(err)}`);
        console.error(err);
        process.exitCode = 1;
    } finally {
        if (db) {
            await db.disconnect();
            success('Connection closed');
        }
    }
}

log('\n🚀 Running MySQL smoke test\n', colors.bright);
runTests().then(() => {
    log('\n✨ Done\n', colors.bright + colors.green);
}).catch((err: unknown) => {
    error(`\nUnexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
});
