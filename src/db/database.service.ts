import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Kysely, MysqlDialect } from 'kysely';
import { createPool, Pool, PoolOptions } from 'mysql2';
import { DbRouter } from './db-router';
import type { DB } from './types';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  // ✅ The main entry point for Repositories
  public readonly db: DbRouter;

  // Internal connection pools (stored for cleanup)
  private readonly primaryPool: Pool;
  private readonly replicaPools: Pool[] = [];

  private readonly writeDb: Kysely<DB>;

  constructor() {
    const connectionLimit = parseInt(process.env.DB_CONNECTION_LIMIT || '10');

    const commonConfig: PoolOptions = {
      user: process.env.DATABASE_USER || 'root',
      password: process.env.DATABASE_PASSWORD || '',
      database: process.env.DATABASE_NAME || 'ontology_collab',
      connectionLimit,
      // DATETIME columns hold UTC
      typeCast: function (field, next) {
        if (field.type === 'DATETIME' || field.type === 'TIMESTAMP') {
          const value = field.string();
          return value === null ? null : new Date(`${value}Z`);
        }
        return next();
      },
      timezone: 'Z',
    };

    this.primaryPool = createPool({
      ...commonConfig,
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '3306'),
    });

    for (const suffix of ['SLAVE1', 'SLAVE2']) {
      const host = process.env[`DATABASE_${suffix}_HOST`];
      if (!host) continue;
      this.replicaPools.push(
        createPool({
          ...commonConfig,
          host,
          port: parseInt(process.env[`DATABASE_${suffix}_PORT`] || '3306'),
        }),
      );
    }

    this.writeDb = new Kysely<DB>({
      dialect: new MysqlDialect({ pool: this.primaryPool }),
      log: ['error'],
    });

    this.db = new DbRouter(this.writeDb, this.replicaPools);
  }

  async onModuleInit() {
    try {
      await this.writeDb.selectFrom('ontologies').select('id').limit(1).execute();
      this.logger.log(
        `✅ Database initialized. Replicas connected: ${this.replicaPools.length}`,
      );
    } catch (error) {
      this.logger.error('❌ Failed to connect to database', error);
      throw error;
    }
  }

  async onModuleDestroy() {
    // Kysely's MysqlDialect ends the pool it was given
    await this.db
      .destroy()
      .catch((err) => this.logger.error('Error destroying replicas', err));
    await this.writeDb
      .destroy()
      .catch((err) => this.logger.error('Error destroying Kysely', err));
    this.logger.log('✅ Database connections closed');
  }
}
