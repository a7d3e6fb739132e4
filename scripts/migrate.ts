import knex, { type Knex } from 'knex';

import { getLogger } from '@kernel/logger';
import { loadConfig } from '@config';
import { toError } from '@errors';

import { SqlMigrationSource } from '../migrations/SqlMigrationSource';

/**
* Database migration CLI for the Postgres report store
*
* Commands:
*   up | latest       Run all pending migrations
*   down | rollback   Roll back the last batch (--all for everything)
*   status            Show applied and pending migrations
*/

const logger = getLogger('migrate');

function createKnexInstance(connectionString: string, production: boolean): Knex {
  return knex({
    client: 'pg',
    connection: {
      connectionString,
      ...(production ? { ssl: { rejectUnauthorized: true } } : {}),
    },
    pool: { min: 0, max: 2 },
    migrations: {
      tableName: 'schema_migrations',
      migrationSource: new SqlMigrationSource(),
    },
  });
}

async function runUp(db: Knex): Promise<void> {
  const [batch, log]: [number, string[]] = await db.migrate.latest();
  if (log.length === 0) {
    logger.info('Already up to date');
    return;
  }
  logger.info(`Batch ${batch}: ${log.length} migration(s) applied`, { migrations: log });
}

async function runRollback(db: Knex, all: boolean): Promise<void> {
  const [batch, log]: [number, string[]] = await db.migrate.rollback(undefined, all);
  if (log.length === 0) {
    logger.info('Nothing to roll back');
    return;
  }
  logger.info(`Batch ${batch}: ${log.length} migration(s) rolled back`, { migrations: log });
}

async function runStatus(db: Knex): Promise<void> {
  const [completed, pending]: [unknown[], unknown[]] = await db.migrate.list();
  logger.info('Migration status', {
    completed: completed.length,
    pending: pending.length,
  });
}

async function main(): Promise<number> {
  const command = process.argv[2];
  if (command !== 'up' && command !== 'latest' && command !== 'down' && command !== 'rollback' && command !== 'status') {
    process.stderr.write('Usage: tsx scripts/migrate.ts <up|down|status> [--all]\n');
    return 1;
  }

  const config = loadConfig();
  if (!config.DATABASE_URL) {
    logger.error('DATABASE_URL is required to run migrations');
    return 1;
  }

  const db = createKnexInstance(config.DATABASE_URL, config.NODE_ENV === 'production');
  try {
    switch (command) {
      case 'up':
      case 'latest':
        await runUp(db);
        break;
      case 'down':
      case 'rollback':
        await runRollback(db, process.argv.includes('--all'));
        break;
      case 'status':
        await runStatus(db);
        break;
    }
    return 0;
  } catch (error: unknown) {
    logger.error('Migration failed', toError(error));
    return 1;
  } finally {
    await db.destroy();
  }
}

main().then(code => {
  process.exitCode = code;
}, (error: unknown) => {
  logger.fatal('Migration CLI crashed', toError(error));
  process.exitCode = 1;
});
