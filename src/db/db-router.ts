import { Logger } from '@nestjs/common';
import { Kysely, MysqlDialect } from 'kysely';
import type { Pool } from 'mysql2';
import type { DB } from './types';

export class DbRouter {
  private readonly logger = new Logger(DbRouter.name);
  private readonly replicas: Kysely<DB>[];
  private currentReplicaIndex = 0;

  constructor(
    private readonly writeDb: Kysely<DB>, // Primary instance (Write)
    readPools: Pool[], // Raw pools for replicas (Read)
  ) {
    // Rows keep their snake_case columns; repositories map them to the domain
    this.replicas = readPools.map(
      (pool) => new Kysely<DB>({ dialect: new MysqlDialect({ pool }) }),
    );
  }

  /**
   * Get the write connection (Primary).
   */
  write(): Kysely<DB> {
    return this.writeDb;
  }

  /**
   * Get a read connection using Round-Robin load balancing.
   */
  read(): Kysely<DB> {
    if (this.replicas.length === 0) {
      return this.writeDb; // Fallback to Primary if no replicas
    }

    const replica = this.replicas[this.currentReplicaIndex];
    this.currentReplicaIndex =
      (this.currentReplicaIndex + 1) % this.replicas.length;

    return replica;
  }

  /**
   * Executes a read operation safely with automatic Primary fallback.
   */
  async executeRead<T>(operation: (db: Kysely<DB>) => Promise<T>): Promise<T> {
    const replica = this.read();
    try {
      return await operation(replica);
    } catch (error) {
      if (replica === this.writeDb) throw error;
      this.logger.warn(`⚠️ Replica failed, falling back to Primary: ${String(error)}`);
      return await operation(this.writeDb);
    }
  }

  /** Runs `work` in one transaction on the Primary. */
  transaction<T>(work: (trx: Kysely<DB>) => Promise<T>): Promise<T> {
    return this.writeDb.transaction().execute(work);
  }

  async destroy(): Promise<void> {
    await Promise.all(this.replicas.map((replica) => replica.destroy()));
  }
}
