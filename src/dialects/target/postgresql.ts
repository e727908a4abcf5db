import Knex, { type Knex as KnexType } from 'knex';
import { log } from '../../engine/logger';
import type { SyncSummary, TableRow, TableSpec, TargetConfig, TargetDialect } from '../target';
import { registerTarget } from '../target-registry';

export const quoteSqlLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export const buildTableComment = (table: TableSpec, summary: SyncSummary): string =>
  `${table.description}. ${summary.rowCount} rows from ${summary.source}, synced ${summary.syncedAt.toISOString()}`;

/**
 * PostgreSQL target dialect.
 * Each run replaces the table: drop, re-create with the fixed schema, batch insert.
 */
class PostgreSQLTarget implements TargetDialect {
  readonly name = 'postgresql';

  readonly client: KnexType;
  private readonly table: TableSpec;

  constructor(config: TargetConfig, table: TableSpec) {
    if (config.type !== 'postgresql') {
      throw new Error('Invalid config type for PostgreSQL target');
    }

    const sslConfig = config.ssl ? { rejectUnauthorized: false } : false;

    this.client = Knex({
      client: 'pg',
      connection: {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        application_name: 'bionet-species-sync',
        ssl: sslConfig,
      },
      pool: { min: 0, max: 4 },
      log: {
        warn(message: string) {
          log.knex.warn(message);
        },
        error(message: string) {
          log.knex.error(message);
        },
        deprecate(message: string) {
          log.knex.warn(message);
        },
        debug() {},
      },
    });

    this.table = table;
  }

  async prepare(): Promise<{ seeded: number }> {
    const { name, columns } = this.table;

    await this.client.schema.dropTableIfExists(name);
    await this.client.schema.createTable(name, (builder) => {
      builder.increments('id').primary();
      for (const column of columns) {
        if (column.type === 'date') {
          builder.timestamp(column.name, { useTz: true }).nullable();
        } else if (column.length !== undefined) {
          builder.string(column.name, column.length).nullable();
        } else {
          builder.text(column.name).nullable();
        }
      }
    });

    log.info(`Created table ${name} (${columns.length} columns)`);
    return { seeded: 0 };
  }

  async writeBatch(batch: TableRow[]): Promise<number> {
    if (batch.length === 0) {
      return 0;
    }

    await this.client(this.table.name).insert(batch);
    return batch.length;
  }

  async finalize(summary: SyncSummary): Promise<void> {
    const { name, identityColumn } = this.table;

    await this.client.schema.alterTable(name, (builder) => {
      builder.index([identityColumn], `${name}_${identityColumn}_idx`.toLowerCase());
    });
    // COMMENT does not take bind parameters
    await this.client.raw(`COMMENT ON TABLE ?? IS ${quoteSqlLiteral(buildTableComment(this.table, summary))}`, [name]);
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}

export const createPostgreSQLTarget = (config: TargetConfig, table: TableSpec): TargetDialect =>
  new PostgreSQLTarget(config, table);

registerTarget('postgresql', createPostgreSQLTarget);
