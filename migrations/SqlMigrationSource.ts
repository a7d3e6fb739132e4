import { existsSync, readFileSync, readdirSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Knex } from 'knex';

export const DEFAULT_SQL_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'sql');

/**
* Knex MigrationSource reading paired raw SQL files:
* `<name>.up.sql` and `<name>.down.sql`.
*
* Migrations containing CREATE INDEX CONCURRENTLY run outside a transaction.
*/
export class SqlMigrationSource implements Knex.MigrationSource<string> {
  constructor(private readonly sqlDir: string = DEFAULT_SQL_DIR) {}

  getMigrations(): Promise<string[]> {
    const files = readdirSync(this.sqlDir)
      .filter(f => f.endsWith('.up.sql'))
      .map(f => f.slice(0, -'.up.sql'.length))
      .sort();
    return Promise.resolve(files);
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Promise<Knex.Migration> {
    if (!/^[a-zA-Z0-9_-]+$/.test(migration)) {
      throw new Error(`Invalid migration name: "${migration}"`);
    }

    const upPath = path.join(this.sqlDir, `${migration}.up.sql`);
    const downPath = path.join(this.sqlDir, `${migration}.down.sql`);
    if (!existsSync(upPath)) {
      throw new Error(`Migration file missing: ${upPath}`);
    }
    if (!existsSync(downPath)) {
      throw new Error(`Migration rollback file missing: ${downPath}`);
    }

    const upSql = readFileSync(upPath, 'utf8');
    const migrationObj: Knex.Migration = {
      up: async (knex: Knex) => {
        await knex.raw(upSql);
      },
      down: async (knex: Knex) => {
        await knex.raw(readFileSync(downPath, 'utf8'));
      },
    };

    if (/CONCURRENTLY/i.test(upSql)) {
      migrationObj.config = { transaction: false };
    }

    return Promise.resolve(migrationObj);
  }
}
